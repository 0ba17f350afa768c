import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';
import { ALL_INVOICE_STATUSES } from '../types/invoice.types';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Fabric Order Ledger API',
      version: '1.0.0',
      description: `
Invoice lifecycle and inventory reservation ledger for a fabric retailer.

## Invoice Lifecycle
1. **warehouse_pending**: created by an accountant or admin, no stock touched
2. **accountant_pending**: warehouse reserved the stock (all line items or none)
3. **approved**: accountant approved the invoice
4. **shipped**: warehouse recorded tracking information (stock-neutral)
5. **delivered**: terminal
6. **cancelled**: terminal; reachable from the first three states and releases exactly what was reserved

## Ledger Guarantees
Every stock change is an append-only ledger entry written in the same transaction as the change, so for every product
\`baseline_quantity + SUM(delta) = quantity_available\` and \`quantity_available >= 0\`.

Transitions on one invoice are linearized; a caller that loses a race receives \`409 CONFLICT\` and should refetch.
Lock waits longer than ${env.LOCK_TIMEOUT_MS}ms are retried up to ${env.TRANSITION_MAX_ATTEMPTS} times.
      `.trim(),
      contact: {
        name: 'API Support',
      },
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      {
        name: 'Invoices',
        description: 'Invoice creation and queries',
      },
      {
        name: 'Invoice lifecycle',
        description: 'Named status transitions',
      },
      {
        name: 'Inventory',
        description: 'Product stock and the inventory ledger',
      },
      {
        name: 'Maintenance',
        description: 'System maintenance operations',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      parameters: {
        InvoiceId: {
          in: 'path',
          name: 'id',
          required: true,
          schema: {
            type: 'string',
            format: 'uuid',
          },
        },
      },
      schemas: {
        InvoiceStatus: {
          type: 'string',
          enum: [...ALL_INVOICE_STATUSES],
        },
        InvoiceLineInput: {
          type: 'object',
          required: ['product_id', 'unit', 'unit_price'],
          description:
            'Give quantity, or rolls_count with pieces_per_roll, or detailed_rolls. detailed_rolls wins over rolls_count, which wins over quantity. The result is rounded to 3 decimals and must stay above 0.',
          properties: {
            product_id: {
              type: 'string',
              format: 'uuid',
            },
            quantity: {
              type: 'number',
              exclusiveMinimum: true,
              minimum: 0,
              description: 'Fractional quantities allowed (e.g. meters of fabric)',
            },
            rolls_count: {
              type: 'number',
              exclusiveMinimum: true,
              minimum: 0,
            },
            pieces_per_roll: {
              type: 'number',
              exclusiveMinimum: true,
              minimum: 0,
              description: 'Required with rolls_count',
            },
            detailed_rolls: {
              type: 'array',
              items: {
                type: 'object',
                required: ['pieces'],
                properties: {
                  pieces: {
                    type: 'array',
                    items: {
                      type: 'object',
                      required: ['measurement'],
                      properties: { measurement: { type: 'number' } },
                    },
                  },
                },
              },
            },
            unit: {
              type: 'string',
              example: 'meter',
            },
            unit_price: {
              type: 'number',
              minimum: 0,
              description: 'Rounded to 2 decimals',
            },
          },
        },
        TrackingInfo: {
          type: 'object',
          required: ['carrier_name', 'tracking_code', 'shipping_date', 'number_of_packages'],
          properties: {
            carrier_name: {
              type: 'string',
            },
            tracking_code: {
              type: 'string',
            },
            shipping_date: {
              type: 'string',
              example: '2026-03-14',
            },
            number_of_packages: {
              type: 'integer',
              minimum: 1,
            },
          },
        },
        Invoice: {
          type: 'object',
          properties: {
            id: {
              type: 'string',
              format: 'uuid',
            },
            invoiceNumber: {
              type: 'string',
              example: 'INV-2026-001',
            },
            status: {
              $ref: '#/components/schemas/InvoiceStatus',
            },
            paymentType: {
              type: 'string',
              enum: ['cash', 'check', 'mixed'],
            },
            paymentBreakdown: {
              type: 'object',
              nullable: true,
            },
            subtotal: {
              type: 'number',
            },
            total: {
              type: 'number',
            },
            items: {
              type: 'array',
              items: {
                type: 'object',
              },
            },
            customer: {
              type: 'object',
            },
            creator: {
              type: 'object',
            },
            tracking: {
              type: 'object',
              nullable: true,
            },
            createdAt: {
              type: 'string',
              format: 'date-time',
            },
            updatedAt: {
              type: 'string',
              format: 'date-time',
            },
          },
        },
        ProductStock: {
          type: 'object',
          properties: {
            id: {
              type: 'string',
              format: 'uuid',
            },
            code: {
              type: 'string',
            },
            name: {
              type: 'string',
            },
            unit: {
              type: 'string',
            },
            quantityAvailable: {
              type: 'number',
              minimum: 0,
              description: 'Quantity free to reserve',
            },
            baselineQuantity: {
              type: 'number',
              description: 'Stock level the ledger starts from',
            },
            allocatedQuantity: {
              type: 'number',
              description: 'Reserved and not yet released, across all invoices',
            },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: {
                  type: 'string',
                  description: 'Error code',
                },
                message: {
                  type: 'string',
                  description: 'Human-readable error message',
                },
                details: {
                  type: 'object',
                  description: 'Additional error details',
                },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'], // Path to route files with JSDoc comments
};

export const swaggerSpec = swaggerJsdoc(options);
