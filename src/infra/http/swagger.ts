import swaggerJsdoc from 'swagger-jsdoc';

const nullableString = { type: 'string', nullable: true } as const;

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Password Vault API',
      version: '1.0.0',
      description: 'Owner-scoped REST API for users, folders and password entries',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'NOT_FOUND',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Entry not found',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        UserResponse: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            username: { type: 'string', example: 'alice' },
          },
        },
        FolderResponse: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            ownerId: { type: 'string', format: 'uuid' },
            name: { type: 'string', example: 'Work' },
          },
        },
        PasswordEntryInput: {
          type: 'object',
          properties: {
            name: { type: 'string', minLength: 1, maxLength: 100, example: 'Gmail' },
            username: { ...nullableString, maxLength: 100 },
            secret: nullableString,
            url: { ...nullableString, maxLength: 500 },
            notes: nullableString,
            folderId: { ...nullableString, format: 'uuid' },
          },
        },
        PasswordEntryResponse: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            ownerId: { type: 'string', format: 'uuid' },
            folderId: { ...nullableString, format: 'uuid' },
            name: { type: 'string' },
            username: nullableString,
            url: nullableString,
            notes: nullableString,
          },
        },
      },
    },
    tags: [
      { name: 'Users', description: 'Vault accounts' },
      { name: 'Folders', description: 'Folder management' },
      { name: 'Entries', description: 'Password entries' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
