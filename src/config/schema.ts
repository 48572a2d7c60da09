/**
 * Zod schema for user-facing configuration (config.json).
 *
 * Validates `~/.config/trace-digest/config.json` and
 * `.trace-digest/config.json`. Every key is optional; missing keys fall
 * back to DEFAULT_CONFIG.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export const UserConfigSchema = z
  .object({
    /** Sub-directory of a run holding the trace files */
    traceDirName: z.string().min(1).optional(),
    /** File name prefix before the sequence number */
    traceFilePrefix: z.string().min(1).optional(),
    /** Sub-directory of a run receiving formatted documents */
    formattedDirName: z.string().min(1).optional(),
    /** Summary document name inside the run directory */
    summaryFileName: z.string().min(1).optional(),
    timelinePreviewChars: z.number().int().min(10).optional(),
    cyclePreviewChars: z.number().int().min(10).optional(),
    /** Pretty-print JSON message content in formatted documents */
    prettyPrintJson: z.boolean().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    /** Also append JSON log lines to this file */
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;

type RequiredKeys = Exclude<keyof ValidatedUserConfig, 'logFile'>;

export type ResolvedConfig = { [K in RequiredKeys]-?: NonNullable<ValidatedUserConfig[K]> } & {
  logFile?: string;
};
