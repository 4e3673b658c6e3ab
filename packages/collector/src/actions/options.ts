import { z } from 'zod';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

function numberFromCli(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsedValue = Number(value);
    return Number.isFinite(parsedValue) ? parsedValue : value;
  }

  return value;
}

function trimToUndefined(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : undefined;
  }

  return value;
}

export function flagOption() {
  return booleanFromCliSchema.default('false');
}

export function integerOption(flag: string, min: number) {
  const message =
    min > 0
      ? `Invalid --${flag}. Provide a positive integer.`
      : `Invalid --${flag}. Provide an integer >= ${min}.`;

  return z
    .preprocess(
      numberFromCli,
      z.number({ invalid_type_error: message }).int(message).min(min, message),
    )
    .optional();
}

export function textOption(flag: string) {
  return z
    .preprocess(trimToUndefined, z.string().min(1, `Invalid --${flag}`))
    .optional();
}

export function requiredIdOption() {
  return z
    .string({ required_error: 'Missing required option: --id' })
    .trim()
    .min(1, 'Missing required option: --id');
}

export function listOption(flag: string) {
  return z
    .preprocess((value) => {
      if (typeof value !== 'string') {
        return value;
      }

      return value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
    }, z.array(z.string(), { invalid_type_error: `Invalid --${flag}` }))
    .optional();
}

export const commonOptionsSchema = z.object({
  config: textOption('config'),
  pretty: flagOption(),
});

export { booleanFromCliSchema };
