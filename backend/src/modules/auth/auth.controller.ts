/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for the auth endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - /auth/me runs behind the bearer guard (see auth.routes.ts).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { emailLoginSchema, googleLoginSchema } from './auth.schemas';
import { invalidBody } from '../../shared/http/validation';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';

const HEALTH_RESPONSE = { status: 'healthy', service: 'authentication' } as const;

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async google(req: FastifyRequest, reply: FastifyReply) {
    const parsed = googleLoginSchema.safeParse(req.body);
    if (!parsed.success) throw invalidBody(parsed.error);

    const result = await this.authService.loginWithGoogle({
      accessToken: parsed.data.access_token,
      idToken: parsed.data.id_token,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async email(req: FastifyRequest, reply: FastifyReply) {
    const parsed = emailLoginSchema.safeParse(req.body);
    if (!parsed.success) throw invalidBody(parsed.error);

    const result = await this.authService.loginWithEmail({
      email: parsed.data.email,
      name: parsed.data.name,
      picture: parsed.data.picture,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireAuthContext(req);
    const user = await this.authService.me(userId);
    return reply.status(200).send(user);
  }

  health(_req: FastifyRequest, reply: FastifyReply) {
    return reply.status(200).send(HEALTH_RESPONSE);
  }
}
