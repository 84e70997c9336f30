import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import {
  CustomsClearanceSelectSchema,
  CustomsUpdateSchema,
  ErrorResponseSchema,
  IdParamSchema,
} from '@tracklane/types';
import { updateCustomsClearance } from './services.js';

export default async function customsRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // PATCH /v1/customs/:id
  r.patch(
    '/:id',
    {
      preHandler: app.requireApiKey(['tracking:write']),
      schema: {
        tags: ['Customs'],
        params: IdParamSchema,
        body: CustomsUpdateSchema,
        response: { 200: CustomsClearanceSelectSchema, 400: ErrorResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => updateCustomsClearance(req.params.id, req.body)
  );
}
