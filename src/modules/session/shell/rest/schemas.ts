/**
 * Session Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { DateTimeSchema, OkResponseSchema } from '../../../../common/schemas/base.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shared
// ─────────────────────────────────────────────────────────────────────────────

export const RoleSchema = Type.Union([
  Type.Literal('Investor'),
  Type.Literal('Researcher'),
  Type.Literal('Administrator'),
]);

export const PageSchema = Type.Union([
  Type.Literal('Home'),
  Type.Literal('Investor'),
  Type.Literal('Researcher'),
  Type.Literal('Admin'),
]);

export const PublicUserSchema = Type.Object({
  id: Type.Integer(),
  username: Type.String(),
  role: RoleSchema,
  email: Type.String(),
  createdAt: DateTimeSchema,
});

const SessionUserSchema = Type.Object({
  id: Type.Integer(),
  username: Type.String(),
  role: RoleSchema,
});

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registration form. Emptiness is checked by the controller so that its
 * error order holds.
 */
export const RegisterBodySchema = Type.Object(
  {
    username: Type.String({ maxLength: 100 }),
    password: Type.String({ maxLength: 200 }),
    confirmPassword: Type.String({ maxLength: 200 }),
    role: RoleSchema,
    email: Type.Optional(Type.String({ maxLength: 254 })),
    adminCode: Type.Optional(Type.String({ maxLength: 200 })),
  },
  { additionalProperties: false }
);

export type RegisterBody = Static<typeof RegisterBodySchema>;

export const LoginBodySchema = Type.Object(
  {
    identifier: Type.String({ maxLength: 254, description: 'Username or email' }),
    password: Type.String({ maxLength: 200 }),
  },
  { additionalProperties: false }
);

export type LoginBody = Static<typeof LoginBodySchema>;

export const SourceFileParamsSchema = Type.Object({
  filename: Type.String({ minLength: 1, maxLength: 255 }),
});

export type SourceFileParams = Static<typeof SourceFileParamsSchema>;

export const UserIdParamsSchema = Type.Object({
  id: Type.Integer({ minimum: 1 }),
});

export type UserIdParams = Static<typeof UserIdParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RegisterResponseSchema = OkResponseSchema(Type.Object({ user: PublicUserSchema }));

export const LoginResponseSchema = OkResponseSchema(
  Type.Object({
    token: Type.String(),
    user: SessionUserSchema,
    pages: Type.Array(PageSchema),
  })
);

export const SessionResponseSchema = OkResponseSchema(
  Type.Object({
    authenticated: Type.Boolean(),
    user: Type.Union([SessionUserSchema, Type.Null()]),
    pages: Type.Array(PageSchema),
  })
);

export const LogoutResponseSchema = OkResponseSchema(Type.Object({ loggedOut: Type.Literal(true) }));

export const ReplaceSourceResponseSchema = OkResponseSchema(
  Type.Object({
    file: Type.String(),
    rowCount: Type.Integer(),
    loadedAt: DateTimeSchema,
  })
);

export const UserListResponseSchema = OkResponseSchema(
  Type.Object({ users: Type.Array(PublicUserSchema) })
);

export const DeleteUserResponseSchema = OkResponseSchema(Type.Object({ deleted: Type.Boolean() }));
