import { z } from 'zod';
import { BridgePayloadSchema } from './result-batch';

export const BRIDGE_API_VERSION = 1;

export const BridgeMessageType = {
  READY: 'bridge:ready',
  RENDER: 'bridge:render',
  SET_READY: 'bridge:set-ready',
  SET_VALUE: 'bridge:set-value',
  SET_FRAME_HEIGHT: 'bridge:set-frame-height',
} as const;

// Sandbox -> host

export const ReadyMessageSchema = z.object({
  type: z.literal(BridgeMessageType.READY),
  apiVersion: z.number().int(),
});

export const SetReadyMessageSchema = z.object({
  type: z.literal(BridgeMessageType.SET_READY),
  sessionId: z.string(),
});

export const SetValueMessageSchema = z.object({
  type: z.literal(BridgeMessageType.SET_VALUE),
  sessionId: z.string(),
  value: BridgePayloadSchema,
});

// sessionId is absent while the sandbox only broadcasts
export const SetFrameHeightMessageSchema = z.object({
  type: z.literal(BridgeMessageType.SET_FRAME_HEIGHT),
  sessionId: z.string().optional(),
  height: z.number().nonnegative(),
});

export const OutboundMessageSchema = z.discriminatedUnion('type', [
  ReadyMessageSchema,
  SetReadyMessageSchema,
  SetValueMessageSchema,
  SetFrameHeightMessageSchema,
]);

// Host -> sandbox

export const RenderMessageSchema = z.object({
  type: z.literal(BridgeMessageType.RENDER),
  sessionId: z.string().min(1),
  args: z.record(z.unknown()).optional(),
});

export type ReadyMessage = z.infer<typeof ReadyMessageSchema>;
export type SetReadyMessage = z.infer<typeof SetReadyMessageSchema>;
export type SetValueMessage = z.infer<typeof SetValueMessageSchema>;
export type SetFrameHeightMessage = z.infer<typeof SetFrameHeightMessageSchema>;
export type OutboundMessage = z.infer<typeof OutboundMessageSchema>;
export type RenderMessage = z.infer<typeof RenderMessageSchema>;
