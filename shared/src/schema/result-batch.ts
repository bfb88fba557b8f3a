import { z } from 'zod';
import { FileRecordSchema } from './file-record';

// Records plus the diagnostic timeline of one probe run
export const ResultBatchSchema = z.object({
  metadata: z.array(FileRecordSchema),
  timeline: z.array(z.string()),
});

// What the host receives over a direct call or a session-scoped message
export const BridgePayloadSchema = ResultBatchSchema.extend({
  payloadSizeHint: z.number().int().nonnegative(),
});

/**
 * Accepted shapes for an inbound fallback value: a full batch (optionally
 * carrying the size hint) or, for older senders, a bare record list.
 */
export const InboundBatchSchema = z.union([
  ResultBatchSchema.extend({
    timeline: z.array(z.string()).default([]),
    payloadSizeHint: z.number().int().nonnegative().optional(),
  }),
  z.array(FileRecordSchema),
]);

export type ResultBatch = z.infer<typeof ResultBatchSchema>;
export type BridgePayload = z.infer<typeof BridgePayloadSchema>;
