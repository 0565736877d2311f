import { z } from 'zod';

export const cameraModeSchema = z.enum(['motion', 'smart']);
export const shotTypeSchema = z.enum(['single', 'burst']);

export const modeMessageSchema = z.object({
  type: z.literal('mode'),
  mode: cameraModeSchema,
});

export const shootMessageSchema = z.object({
  type: z.literal('shoot'),
  shot: shotTypeSchema,
});

export const imagePathMessageSchema = z.object({
  type: z.literal('image_path'),
  path: z.string().min(1),
});

export const controlMessageSchema = z.discriminatedUnion('type', [
  modeMessageSchema,
  shootMessageSchema,
  imagePathMessageSchema,
]);

export const modeRequestSchema = z.object({
  mode: cameraModeSchema,
});

export const shootRequestSchema = z.object({
  shot: shotTypeSchema,
});

export type CameraMode = z.infer<typeof cameraModeSchema>;
export type ShotType = z.infer<typeof shotTypeSchema>;
export type ModeMessage = z.infer<typeof modeMessageSchema>;
export type ShootMessage = z.infer<typeof shootMessageSchema>;
export type ImagePathMessage = z.infer<typeof imagePathMessageSchema>;
export type ControlMessage = z.infer<typeof controlMessageSchema>;
