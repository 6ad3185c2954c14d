/**
 * Site Map REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { OkResponseSchema } from '../../../../common/schemas/base.js';

export const MapQuerySchema = Type.Object({
  mineral: Type.Optional(Type.String({ minLength: 1, maxLength: 200 })),
});

export type MapQuery = Static<typeof MapQuerySchema>;

const CoordinatesSchema = Type.Object({
  latitude: Type.Number(),
  longitude: Type.Number(),
});

export const MapMarkerSchema = Type.Object({
  latitude: Type.Number(),
  longitude: Type.Number(),
  color: Type.String(),
  label: Type.Object({
    siteName: Type.Union([Type.String(), Type.Null()]),
    mineralName: Type.String(),
    countryName: Type.String(),
    production: Type.String({ description: 'Whole tonnes with thousands separators' }),
  }),
});

export const MapModelSchema = Type.Object({
  center: CoordinatesSchema,
  zoom: Type.Number(),
  markers: Type.Array(MapMarkerSchema),
  legend: Type.Array(Type.Object({ mineralName: Type.String(), color: Type.String() })),
});

/** null when there are no joined sites */
export const NullableMapModelSchema = Type.Union([MapModelSchema, Type.Null()]);

export const MapResponseSchema = OkResponseSchema(Type.Object({ map: NullableMapModelSchema }));
