import { z } from 'zod/v4';
import {
  CustomsClearanceSelectSchema,
  CustomsCreateSchema,
  CustomsUpdateSchema,
} from '../schemas/customs.js';
import {
  ExceptionOpenSchema,
  ExceptionSelectSchema,
  ExceptionsListQuerySchema,
} from '../schemas/exceptions.js';

export type CustomsClearance = z.infer<typeof CustomsClearanceSelectSchema>;
export type CustomsCreate = z.infer<typeof CustomsCreateSchema>;
export type CustomsUpdate = z.infer<typeof CustomsUpdateSchema>;
export type ShipmentException = z.infer<typeof ExceptionSelectSchema>;
export type ExceptionOpen = z.infer<typeof ExceptionOpenSchema>;
export type ExceptionsListQuery = z.infer<typeof ExceptionsListQuerySchema>;
