/**
 * Webhook payload validation
 *
 * Accepts a form builder field list ({ name, value, type } or
 * { fieldName, fieldValue }) or a flat { field: value } object and
 * replaces req.body with the parsed FormSubmission.
 */

import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { ERROR_MESSAGES, HTTP_STATUS } from '../config/constants';
import type { FormField } from '../types/form.types';
import { loggerFor } from './requestLogger';

const fieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.union([z.string(), z.number()])).transform((items) => items.map(String)),
]);

const builderFieldSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  name: z.string().min(1, 'Field name cannot be empty'),
  value: fieldValueSchema.optional(),
  type: z.string().optional(),
});

const namedFieldSchema = z.object({
  fieldName: z.string().min(1, 'Field name cannot be empty'),
  fieldValue: fieldValueSchema.optional(),
  fieldType: z.string().optional(),
});

const fieldSchema = z
  .union([namedFieldSchema, builderFieldSchema])
  .transform((field): FormField =>
    'fieldName' in field
      ? { fieldName: field.fieldName, fieldValue: field.fieldValue ?? null, fieldType: field.fieldType }
      : { fieldName: field.name, fieldValue: field.value ?? null, fieldType: field.type }
  );

export const submissionSchema = z.union([
  z.array(fieldSchema).min(1, ERROR_MESSAGES.EMPTY_PAYLOAD),
  z
    .record(z.string(), fieldValueSchema)
    .refine((fields) => Object.keys(fields).length > 0, { message: ERROR_MESSAGES.EMPTY_PAYLOAD }),
]);

export function validateSubmission(req: Request, res: Response, next: NextFunction): void {
  const result = submissionSchema.safeParse(req.body);

  if (!result.success) {
    const details = result.error.errors.map((e) => ({
      field: e.path.join('.') || 'body',
      message: e.message,
    }));

    loggerFor(res).warn({ details }, 'Rejected webhook payload');

    res.status(HTTP_STATUS.BAD_REQUEST).json({
      success: false,
      error: ERROR_MESSAGES.INVALID_PAYLOAD,
      details,
    });
    return;
  }

  // Replace body with the validated/parsed data
  req.body = result.data;
  next();
}
