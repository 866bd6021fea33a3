import { z, type ZodError, type ZodTypeAny } from 'zod';
import { HypervisorMode, RegisterBackend } from '../types/index.js';

/**
 * Validation result type.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Generic validation function for Zod schemas.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatZodErrors(result.error) };
}

/**
 * Validate and throw on error.
 */
export function validateOrThrow<S extends ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = validate(schema, data);
  if (!result.success) {
    const errorMessages = result.errors
      .map((e) => `${e.path ? `${e.path}: ` : ''}${e.message}`)
      .join('; ');
    throw new Error(`Validation failed: ${errorMessages}`);
  }
  return result.data;
}

/**
 * CLI-specific schemas for command parsing.
 */

const modeSchema = z.nativeEnum(HypervisorMode);
const registerSchema = z.nativeEnum(RegisterBackend).default(RegisterBackend.RHSM);

/**
 * Schema for run command options.
 */
export const runCommandOptionsSchema = z.object({
  mode: modeSchema,
  register: registerSchema,
  service: z.boolean().default(false),
  debug: z.boolean().default(true),
  oneshot: z.boolean().default(true),
  interval: z.coerce.number().int().positive().optional(),
  print: z.boolean().default(false),
  // false comes from --no-config
  config: z.union([z.string().min(1), z.literal(false)]).optional(),
  wait: z.coerce.number().int().min(0).max(3600).optional(),
  json: z.boolean().default(false),
  settings: z.string().min(1).optional(),
});

export type RunCommandOptions = z.infer<typeof runCommandOptionsSchema>;

/**
 * Schema for analyze command options.
 */
export const analyzeCommandOptionsSchema = z.object({
  mode: modeSchema,
  register: registerSchema,
  selfGuest: z.string().default(''),
  json: z.boolean().default(false),
});

export type AnalyzeCommandOptions = z.infer<typeof analyzeCommandOptionsSchema>;

const assignmentSchema = z
  .string()
  .regex(/^[^=\s]+=.*$/, 'Expected key=value')
  .transform((value) => {
    const separator = value.indexOf('=');
    return { key: value.slice(0, separator), value: value.slice(separator + 1) };
  });

/**
 * Schema for configure command options.
 */
export const configureCommandOptionsSchema = z.object({
  mode: modeSchema,
  register: registerSchema,
  set: z.array(assignmentSchema).default([]),
  unset: z.array(z.string().min(1)).default([]),
  json: z.boolean().default(false),
  settings: z.string().min(1).optional(),
});

export type ConfigureCommandOptions = z.infer<typeof configureCommandOptionsSchema>;

/**
 * Commander accumulator for repeatable options.
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
