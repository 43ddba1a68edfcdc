import { z } from 'zod';

// ===== Configuration =====

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const CliffKnapsackConfigSchema = z.object({
  instance: z.object({
    /** Instance file used when a command is not given one */
    path: z.string().optional(),
  }).default({}),
  scoring: z.object({
    /**
     * Reject choice vectors whose length differs from the item count.
     * Off keeps zip-truncation: extra items or extra bits are ignored.
     */
    strictLength: z.boolean().default(false),
  }).default({}),
  report: z.object({
    entropy: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
    pretty: z.boolean().default(false),
    file: z.string().optional(),
  }).default({}),
});

export type CliffKnapsackConfig = z.infer<typeof CliffKnapsackConfigSchema>;

export type CliffKnapsackConfigInput = z.input<typeof CliffKnapsackConfigSchema>;
