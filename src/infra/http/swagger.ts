import swaggerJsdoc from 'swagger-jsdoc';

/**
 * OpenAPI document assembled from the @openapi blocks in the route modules.
 */
export function buildOpenApiSpec(serviceName: string, version: string): object {
  const options: swaggerJsdoc.Options = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: serviceName,
        version,
        description: 'User accounts REST API',
      },
      components: {
        schemas: {
          User: {
            type: 'object',
            required: ['id', 'username', 'email', 'created_at'],
            properties: {
              id: { type: 'integer', example: 1 },
              username: { type: 'string', example: 'alice' },
              email: { type: 'string', format: 'email', example: 'alice@example.com' },
              created_at: { type: 'string', format: 'date-time' },
            },
          },
          ErrorResponse: {
            type: 'object',
            required: ['code', 'message'],
            properties: {
              code: {
                type: 'string',
                description: 'Error code identifier',
                example: 'CONFLICT',
              },
              message: {
                type: 'string',
                description: 'Human-readable error message',
                example: 'username already exists',
              },
              details: {
                type: 'object',
                description: 'Additional error details (optional)',
                additionalProperties: true,
              },
            },
          },
        },
      },
      tags: [
        { name: 'Status', description: 'Status and health endpoints' },
        { name: 'Users', description: 'User accounts' },
      ],
    },
    apis: ['./src/infra/http/routes/*.ts'],
  };

  return swaggerJsdoc(options);
}
