// api/storage.ts - Storage HTTP API request/response types + TypeBox Schemas

import { Type, type Static } from '@sinclair/typebox';

// =============================================================================
// REQUESTS
// =============================================================================

export interface CreateTenantRequest {
  new_tenant_id: string;
}

export interface CreateTimelineRequest {
  new_timeline_id: string;
  pg_version: number;
  ancestor_timeline_id?: string;
  ancestor_start_lsn?: string;
}

/** Body of POST /control/v1/node */
export interface NodeRegistrationRequest {
  node_id: number;
  listen_pg_addr: string;
  listen_pg_port: number;
  listen_http_addr: string;
  listen_http_port: number;
  availability_zone_id: string;
}

// =============================================================================
// RESPONSES
// =============================================================================

export const TenantInfoSchema = Type.Object({
  tenant_id: Type.String(),
});
export type TenantInfo = Static<typeof TenantInfoSchema>;

export const TenantListResponseSchema = Type.Array(TenantInfoSchema);

export const TimelineInfoSchema = Type.Object({
  timeline_id: Type.String(),
  tenant_id: Type.Optional(Type.String()),
  ancestor_timeline_id: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  pg_version: Type.Optional(Type.Integer()),
});
export type TimelineInfo = Static<typeof TimelineInfoSchema>;

export const TimelineListResponseSchema = Type.Array(TimelineInfoSchema);

export type RegistrationOutcome = 'registered' | 'already_registered';
