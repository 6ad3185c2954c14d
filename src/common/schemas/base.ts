/**
 * Common TypeBox schemas used across modules
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

/**
 * ISO 8601 date-time string
 */
export const DateTimeSchema = Type.String({
  format: 'date-time',
  description: 'ISO 8601 date-time string',
});

/**
 * Error envelope returned by every route
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

/**
 * Success envelope around `data`
 */
export const OkResponseSchema = <T extends TSchema>(data: T) =>
  Type.Object({
    ok: Type.Literal(true),
    data,
  });
