import type { Actor } from './invoice.types';

declare global {
  namespace Express {
    interface Request {
      auth?: Actor;
    }
  }
}

export {};
