import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { hasZodFastifySchemaValidationErrors } from 'fastify-type-provider-zod';
import { errorResponse, errorResponseForStatus, TrackingError } from '../lib/errors.js';
import { toTrackingError } from '../lib/pg-errors.js';

// zod's issue code for a value outside an enum / literal set
const ENUM_ISSUE = 'invalid_value';

const plugin: FastifyPluginAsync = fp(
  async (app) => {
    app.setErrorHandler((err: FastifyError, req, reply) => {
      if (hasZodFastifySchemaValidationErrors(err)) {
        const issues = err.validation.map((v) => ({
          path: v.instancePath,
          code: v.keyword,
          message: v.message,
        }));
        const code = issues.some((i) => i.code === ENUM_ISSUE)
          ? 'ERR_INVALID_ENUM_VALUE'
          : 'ERR_VALIDATION';
        const where = err.validationContext ?? 'request';
        return reply
          .status(400)
          .send(errorResponse(`Invalid ${where}: ${issues[0]?.message ?? 'bad input'}`, code, issues));
      }

      const mapped = toTrackingError(err);
      if (mapped instanceof TrackingError) {
        if (mapped.statusCode >= 500) req.log.error({ err: mapped }, 'request_error');
        return reply
          .status(mapped.statusCode)
          .send(errorResponse(mapped.message, mapped.code, mapped.details));
      }

      const raw = err.statusCode ?? 500;
      const status = Number.isInteger(raw) && raw >= 400 && raw <= 599 ? raw : 500;
      if (status >= 500) {
        req.log.error({ err }, 'request_error');
        return reply.status(500).send(errorResponse('Internal Server Error', 'ERR_INTERNAL'));
      }

      const message = err.message || 'Bad Request';
      return reply.status(status).send(errorResponseForStatus(status, message));
    });
  },
  { name: 'error-handler' }
);

export default plugin;
