/**
 * Zod schemas for message validation.
 */
import { z } from 'zod';
import { BRIDGE_MESSAGE_TYPES } from './types/bridge.js';

// Envelope schemas
export const bridgeMessageTypeSchema = z.enum(BRIDGE_MESSAGE_TYPES);

export const bridgeRequestSchema = z.object({
  type: bridgeMessageTypeSchema,
  callback: z.string().nullish(),
  data: z.unknown().optional(),
});

export const bridgeResponseSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    message: z.string(),
    data: z.unknown().optional(),
  }),
  z.object({
    success: z.literal(false),
    message: z.string(),
  }).strict(),
]);

export const callbackFrameSchema = z.object({
  kind: z.literal('callback'),
  callback: z.string().min(1),
  payload: z.string(),
});

// Per-type payload schemas
export const greetingRequestSchema = z.object({
  text: z.string(),
  timestamp: z.string().nullish(),
});

export const openUrlRequestSchema = z.object({
  url: z.string().url(),
});

export const showToastRequestSchema = z.object({
  message: z.string(),
});

// Per-type reply data schemas
export const greetingResponseSchema = z.object({
  text: z.string(),
});

export const userInfoResponseSchema = z.object({
  name: z.string(),
  device: z.string(),
  osVersion: z.string(),
});

export const appVersionResponseSchema = z.object({
  appVersion: z.string(),
  osVersion: z.string(),
  device: z.string(),
});
