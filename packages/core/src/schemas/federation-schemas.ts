// packages/core/src/schemas/federation-schemas.ts
import { z } from 'zod';

// --- Data classification ---

/**
 * Federation data classes a policy can admit or share.
 */
export const DataTypeSchema = z.enum([
  'friendly',
  'hostile',
  'unknown',
  'neutral',
  'sensor',
  'geofence',
  'route',
  'casevac',
  'target',
]);
export type DataType = z.infer<typeof DataTypeSchema>;

export const DataTypeSelectorSchema = z.union([DataTypeSchema, z.literal('all')]);
export type DataTypeSelector = z.infer<typeof DataTypeSelectorSchema>;

// --- Sharing policy ---

export const DataSharingPolicySchema = z.object({
  receiveTypes: z.array(DataTypeSelectorSchema),
  sendTypes: z.array(DataTypeSelectorSchema),
  autoShare: z.boolean(),
  blueTeamOnly: z.boolean(),
  bidirectional: z.boolean(),
});
export type DataSharingPolicy = z.infer<typeof DataSharingPolicySchema>;

export const PartialDataSharingPolicySchema = DataSharingPolicySchema.partial();

// --- Server connection ---

export const TransportProtocolSchema = z.enum(['tcp', 'udp', 'tls', 'websocket']);
export type TransportProtocol = z.infer<typeof TransportProtocolSchema>;

/**
 * Connection settings handed to the transport. `certificateId` is an opaque
 * reference to a credential the host resolves.
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  protocol: TransportProtocolSchema,
  useTls: z.boolean(),
  certificateId: z.string().min(1).optional(),
  reconnect: z.boolean(),
  reconnectDelayMs: z.number().int().nonnegative(),
}).superRefine((config, ctx) => {
  if (config.protocol === 'tls' && !config.useTls) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'protocol "tls" requires useTls',
      path: ['useTls'],
    });
  }
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
