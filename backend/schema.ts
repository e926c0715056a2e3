import { z } from 'zod';

/*
  Character / model record as stored in the "models" collection.
  Only the fields this service touches are typed; the rest pass through.
*/
export const modelRecordSchema = z
  .object({
    user_id: z.string(),
    color: z.string().optional(),
    original_material: z.boolean().optional(),
  })
  .passthrough();

export type ModelRecord = z.infer<typeof modelRecordSchema>;

export function modelFromDict(data: Record<string, unknown>): ModelRecord {
  return modelRecordSchema.parse(data);
}

export const documentRowSchema = z.object({
  id: z.string(),
  data: z.record(z.unknown()),
});

export type DocumentRow = z.infer<typeof documentRowSchema>;

const hexColorSchema = z
  .string()
  .regex(/^#?(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Color must be a hex color');

export const emptyArgsSchema = z.object({});

export const saveModelColorArgsSchema = z.object({
  color: hexColorSchema,
});

export const functionCallInputSchema = z.object({
  user_id: z.string().min(1).optional(),
  args: z.record(z.unknown()).default({}),
});

export type FunctionCallInput = z.infer<typeof functionCallInputSchema>;
