import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'User Service API',
      version: '1.0.0',
      description: 'Read-only REST API over an in-memory user registry',
    },
    servers: [
      {
        url: 'http://localhost:4000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        User: {
          type: 'object',
          required: ['id', 'email', 'elapsed'],
          properties: {
            id: { type: 'string', example: 'fece' },
            email: { type: 'string', format: 'email', example: 'bill@deadbug.com' },
            elapsed: {
              type: 'integer',
              description: 'Computed just before the response is written',
              example: 10,
            },
          },
        },
        ErrResponse: {
          type: 'object',
          required: ['status'],
          properties: {
            status: {
              type: 'string',
              description: 'User-level status message',
              example: 'Error rendering response.',
            },
            error: {
              type: 'string',
              description: 'Underlying error message, for debugging',
            },
          },
        },
      },
    },
    tags: [{ name: 'Users', description: 'User lookup' }],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
