import { FastifyInstance } from 'fastify';
import { UserLookupService, type Principal } from '../services/UserLookupService';
import { EmailParamsSchema, UsernameParamsSchema } from '../schemas';
import { EmailParam, ErrorResponse, PrincipalResponse, UsernameParam } from '../schemas/openapi';

// The password never leaves the service.
function principalToResponse(principal: Principal) {
  return {
    username: principal.username,
    email: principal.email,
    enabled: principal.enabled,
    authorities: principal.authorities,
  };
}

export async function principalRoutes(app: FastifyInstance): Promise<void> {
  const service: UserLookupService = app.ctx.lookup;

  app.get('/principals/by-username/:username', {
    schema: {
      tags: ['Principals'],
      summary: 'Carregar principal pelo username',
      params: UsernameParam,
      response: {
        200: PrincipalResponse,
        404: ErrorResponse,
        500: ErrorResponse,
      },
    },
  }, async (request) => {
    const { username } = UsernameParamsSchema.parse(request.params);
    const principal = service.lookupByUsername(username);
    request.log.debug({ username, authorities: principal.authorities.length }, 'principal loaded');
    return principalToResponse(principal);
  });

  app.get('/principals/by-email/:email', {
    schema: {
      tags: ['Principals'],
      summary: 'Carregar principal pelo email',
      params: EmailParam,
      response: {
        200: PrincipalResponse,
        400: ErrorResponse,
        404: ErrorResponse,
        500: ErrorResponse,
      },
    },
  }, async (request) => {
    const { email } = EmailParamsSchema.parse(request.params);
    const principal = service.lookupByEmail(email);
    request.log.debug({ username: principal.username, authorities: principal.authorities.length }, 'principal loaded');
    return principalToResponse(principal);
  });
}
