// api/compute-spec.ts - Compute runtime configuration document + TypeBox Schemas
//
// The document is mounted into a compute pod as /config/spec.json and read
// by compute_ctl on start.

import { Type, type Static, type TSchema } from '@sinclair/typebox';

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const HexIdSchema = Type.String({ pattern: '^[0-9a-f]{32}$' });

export const ComputeSettingSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  value: Type.String(),
  vartype: Type.Union([
    Type.Literal('integer'),
    Type.Literal('string'),
    Type.Literal('bool'),
    Type.Literal('enum'),
  ]),
});
export type ComputeSetting = Static<typeof ComputeSettingSchema>;

export const ComputeRoleSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  encrypted_password: Nullable(Type.String()),
  options: Nullable(Type.Array(Type.String())),
});

export const ComputeDatabaseSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  owner: Type.String({ minLength: 1 }),
});

export const ComputeSpecSchema = Type.Object({
  format_version: Type.Number(),
  timestamp: Type.String(),
  operation_uuid: Type.String(),
  cluster: Type.Object({
    cluster_id: Type.String({ minLength: 1 }),
    name: Type.String({ minLength: 1 }),
    roles: Type.Array(ComputeRoleSchema),
    databases: Type.Array(ComputeDatabaseSchema),
    settings: Type.Array(ComputeSettingSchema),
  }),
  delta_operations: Type.Array(Type.Unknown()),
  tenant_id: HexIdSchema,
  timeline_id: HexIdSchema,
  pageserver_connstring: Type.String({ minLength: 1 }),
  safekeeper_connstrings: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  mode: Type.Literal('Primary'),
  skip_pg_catalog_updates: Type.Boolean(),
});
export type ComputeSpec = Static<typeof ComputeSpecSchema>;
