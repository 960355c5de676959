// Zod schemas for configuration validation

import { z } from 'zod';

/**
 * Hook classes understood by `pre-commit install --hook-type`
 */
export const HookTypeSchema = z.enum([
  'pre-commit',
  'pre-merge-commit',
  'pre-push',
  'prepare-commit-msg',
  'commit-msg',
  'post-checkout',
  'post-commit',
  'post-merge',
  'post-rewrite',
  'pre-rebase'
]);

export type HookType = z.infer<typeof HookTypeSchema>;

/**
 * Shape of .hooktask.yaml; every field optional
 */
export const HookTaskConfigSchema = z.object({
  hookManager: z.string().trim().min(1, 'Hook manager command is required').optional(),
  hookTypes: z.array(HookTypeSchema).min(1, 'At least one hook type is required').optional(),
  installHint: z.string().min(1, 'Install hint is required').optional(),
  helpColumnWidth: z.number().int().min(1).max(80).optional()
}).strict();

export type HookTaskConfig = z.infer<typeof HookTaskConfigSchema>;
