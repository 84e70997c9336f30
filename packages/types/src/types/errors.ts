import { z } from 'zod/v4';
import { ErrorResponseSchema } from '../schemas/errors.js';

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
