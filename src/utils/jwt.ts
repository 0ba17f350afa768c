import jwt, { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';
import { UserRole } from '../types/party.types';
import { Actor } from '../types/invoice.types';

const accessTokenSchema = z.object({
  sub: z.string().uuid(),
  role: z.nativeEnum(UserRole),
});

export type AccessTokenPayload = z.infer<typeof accessTokenSchema>;

export function signAccessToken(payload: AccessTokenPayload, secret: string, expiresIn: SignOptions['expiresIn'] = '15m'): string {
  return jwt.sign(payload, secret, { algorithm: 'HS256', expiresIn });
}

/**
 * Verifies an HS256 bearer token and returns the caller. Throws on a bad
 * signature, an expired token or claims of the wrong shape.
 */
export function verifyAccessToken(token: string, secret: string): Actor {
  const claims = accessTokenSchema.parse(jwt.verify(token, secret, { algorithms: ['HS256'] }));
  return { userId: claims.sub, role: claims.role };
}
