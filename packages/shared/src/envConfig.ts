import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);
const DEFAULT_LIST_SEPARATOR = /[,\s]+/;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

/**
 * Validates the environment against a zod object whose keys are variable names.
 * Every failing variable is reported in a single {@link EnvConfigError}.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'hpc-pulse';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

function describeContext(ctx: z.RefinementCtx, description?: string): string {
  const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return describe(pathName, description);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

/**
 * Resolves a blank variable to its default, or flags it when required.
 * Returns `undefined` for an optional variable without default.
 */
function resolveBlank<T>(options: CommonOptions<T> | undefined, ctx: z.RefinementCtx, description: string) {
  if (options?.defaultValue !== undefined) {
    return { value: options.defaultValue };
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
    return { value: z.NEVER };
  }
  return { value: undefined };
}

export function booleanVar(options?: CommonOptions<boolean>) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const description = describeContext(ctx, options?.description);

    if (isBlank(value)) {
      return resolveBlank(options, ctx, description).value;
    }
    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = describeContext(ctx, options?.description);

    if (isBlank(value)) {
      return resolveBlank(options, ctx, description).value;
    }

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be >= ${options.min}`
      });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be <= ${options.max}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = CommonOptions<string> & {
  pattern?: RegExp;
  lowercase?: boolean;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describeContext(ctx, options?.description);

    if (isBlank(value)) {
      const resolved = resolveBlank(options, ctx, description).value;
      return options?.lowercase && typeof resolved === 'string' ? resolved.toLowerCase() : resolved;
    }

    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;

    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} does not match expected pattern`
      });
      return z.NEVER;
    }

    return normalized;
  });
}

export type StringListOptions = CommonOptions<string[]> & {
  separator?: RegExp | string;
  unique?: boolean;
};

export function stringListVar(options?: StringListOptions) {
  return z.union([z.string(), z.array(z.string())]).nullable().optional().transform((value, ctx) => {
    const description = describeContext(ctx, options?.description);

    if (isBlank(value) || (Array.isArray(value) && value.length === 0)) {
      return resolveBlank(options, ctx, description).value ?? [];
    }

    const separator = options?.separator ?? DEFAULT_LIST_SEPARATOR;
    const list = (Array.isArray(value) ? value : value.split(separator))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);

    return options?.unique ? Array.from(new Set(list)) : list;
  });
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function logLevelVar(options?: CommonOptions<LogLevel>) {
  return stringVar({ description: options?.description, lowercase: true }).transform((value, ctx) => {
    if (value === undefined) {
      return options?.defaultValue ?? 'info';
    }
    if (!isLogLevel(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describeContext(ctx, options?.description)} must be one of ${LOG_LEVELS.join(', ')}`
      });
      return z.NEVER;
    }
    return value;
  });
}

export type HostPortOptions = {
  defaultHost?: string;
  defaultPort?: number;
};

export const hostVar = (options?: HostPortOptions) =>
  stringVar({
    defaultValue: options?.defaultHost ?? '127.0.0.1',
    description: 'host'
  });

export const portVar = (options?: HostPortOptions) =>
  integerVar({
    defaultValue: options?.defaultPort ?? 3000,
    min: 0,
    max: 65535,
    description: 'port'
  });
