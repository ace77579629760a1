// src/schemas.ts
import { z } from 'zod';
import type { BatchRequest } from './batch.js';

export const MAX_RESULTS_PER_REQUEST = 100;

export const interpretRequestSchema = z.object({
  patient: z.object({
    age: z.number().int().min(0).max(120, 'Age must be 120 or less'),
    sex: z.enum(['male', 'female']),
  }),
  results: z
    .array(
      z.object({
        test_code: z.string().trim().min(1).max(32).transform(s => s.toUpperCase()),
        value: z.number().finite(),
        unit: z.string().trim().min(1).max(32),
      })
    )
    .min(1, 'At least one result is required')
    .max(MAX_RESULTS_PER_REQUEST),
});

export type InterpretRequestBody = z.infer<typeof interpretRequestSchema>;

export function toBatchRequest(body: InterpretRequestBody): BatchRequest {
  return {
    patient: body.patient,
    results: body.results.map(r => ({ testCode: r.test_code, value: r.value, unit: r.unit })),
  };
}
