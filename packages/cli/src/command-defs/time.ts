import { z } from 'zod';

const formatSchema = z.enum(['json', 'table']).default('table');

export const nowSchema = z.object({
  format: formatSchema,
});

export const inspectSchema = z.object({
  timestamp: z.string().min(1),
  local: z.boolean().default(false),
  format: formatSchema,
});

export const sinceSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  unit: z.string().min(1).default('s'),
  local: z.boolean().default(false),
  format: formatSchema,
});

export type NowArgs = z.infer<typeof nowSchema>;
export type InspectArgs = z.infer<typeof inspectSchema>;
export type SinceArgs = z.infer<typeof sinceSchema>;
