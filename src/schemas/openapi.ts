// Schemas JSON reutilizáveis para documentação OpenAPI (Swagger)

export const PrincipalResponse = {
  type: 'object',
  properties: {
    username: { type: 'string', example: 'alice' },
    email: { type: 'string', format: 'email' },
    enabled: { type: 'boolean' },
    authorities: { type: 'array', items: { type: 'string' }, example: ['ROLE_ADMIN', 'ROLE_USER'] },
  },
} as const;

export const ErrorResponse = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    code: { type: 'string' },
    details: {},
  },
} as const;

export const UsernameParam = {
  type: 'object',
  properties: {
    username: { type: 'string', description: 'Username do usuário' },
  },
  required: ['username'],
} as const;

export const EmailParam = {
  type: 'object',
  properties: {
    email: { type: 'string', description: 'Email do usuário' },
  },
  required: ['email'],
} as const;
