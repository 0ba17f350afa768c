import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { Container } from './container';
import { allowedOrigins } from './config/environment';
import { swaggerSpec } from './swagger/swagger.config';
import { logger } from './config/logger';

const DOCS_HTML = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Fabric Order Ledger API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui.css">
  <style>
    body { margin: 0; padding: 0; }
    .swagger-ui .topbar { display: none; }
  </style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-bundle.js"></script>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-standalone-preset.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({
        url: '/openapi.json',
        dom_id: '#swagger-ui',
        deepLinking: true,
        presets: [
          SwaggerUIBundle.presets.apis,
          SwaggerUIStandalonePreset
        ],
        layout: "StandaloneLayout",
        persistAuthorization: true,
        displayRequestDuration: true
      });
    };
  </script>
</body>
</html>`;

/**
 * Creates and configures the Express application
 */
export function createApp(container: Container): Application {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for Swagger UI
  }));

  // CORS middleware
  app.use(cors({
    origin: allowedOrigins,
    credentials: true,
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // API Documentation - Swagger UI from CDN
  app.get('/docs', (_req, res) => {
    res.send(DOCS_HTML);
  });

  app.get('/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  // Mount API routes
  app.use('/', createRoutes(container));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.debug('Express application configured');

  return app;
}
