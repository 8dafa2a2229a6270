/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates request payload and wraps the result in the response envelope.
 *
 * RULES:
 * - No store access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';

import { AppError } from '../../shared/http/errors';
import { ok, okWithMeta, paginationMeta } from '../../shared/http/envelope';
import { logRequestBody } from '../../shared/http/request-telemetry';
import { withRequestContext } from '../../shared/logger/with-context';

import { createUserSchema, listUsersQuerySchema, userIdParamsSchema } from './user.schemas';
import type { UserService } from './user.service';
import { UserErrors } from './user.errors';

function toValidationError(err: ZodError): AppError {
  const validationErrors = err.issues.map((issue) => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });

  return AppError.validationError('Request validation failed', {
    validation_errors: validationErrors,
  });
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    logRequestBody(withRequestContext(req), 'users.create', req.body);

    const parsed = createUserSchema.safeParse(req.body);
    if (!parsed.success) throw toValidationError(parsed.error);

    const user = await this.userService.createUser({
      email: parsed.data.email,
      password: parsed.data.password,
      correlationId: req.requestContext.correlationId,
    });

    return reply.status(200).send(ok(user));
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) throw toValidationError(params.error);

    const user = await this.userService.getUserById(params.data.id);
    if (!user) throw UserErrors.userNotFound({ userId: params.data.id });

    return reply.status(200).send(ok(user));
  }

  async listUsers(req: FastifyRequest, reply: FastifyReply) {
    const query = listUsersQuerySchema.safeParse(req.query);
    if (!query.success) throw toValidationError(query.error);

    const result = await this.userService.listUsers(query.data);

    return reply
      .status(200)
      .send(okWithMeta(result.users, paginationMeta(result.page, result.limit, result.total)));
  }

  async updateUser(req: FastifyRequest) {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) throw toValidationError(params.error);

    return this.userService.updateUser(params.data.id);
  }

  async deleteUser(req: FastifyRequest) {
    const params = userIdParamsSchema.safeParse(req.params);
    if (!params.success) throw toValidationError(params.error);

    return this.userService.deleteUser(params.data.id);
  }
}
