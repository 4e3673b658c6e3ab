import { z } from 'zod';
import type { CollectedItem } from '../store/types.js';

const MULTIPLIERS: Record<string, number> = {
  万: 10_000,
  千: 1_000,
};

/**
 * Converts the crawler's display counts to integers:
 * "10万+" → 100000, "2.1万" → 21000, "1,234" → 1234. Unparsable → 0.
 */
export function parseCount(raw: unknown): number {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? Math.max(0, Math.round(raw)) : 0;
  }

  if (typeof raw !== 'string') {
    return 0;
  }

  let text = raw.trim().replace(/,/g, '');
  if (text.endsWith('+')) {
    text = text.slice(0, -1);
  }

  let multiplier = 1;
  for (const [suffix, factor] of Object.entries(MULTIPLIERS)) {
    if (text.includes(suffix)) {
      text = text.replace(suffix, '');
      multiplier = factor;
      break;
    }
  }

  if (!/^\d+(\.\d+)?$/.test(text)) {
    return 0;
  }

  return Math.round(Number(text) * multiplier);
}

const countSchema = z.union([z.string(), z.number()]).optional();

const rawItemSchema = z
  .object({
    note_id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1)),
    user_id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1)),
    title: z.string().nullish(),
    desc: z.string().nullish(),
    type: z.string().nullish(),
    liked_count: countSchema,
    collected_count: countSchema,
    comment_count: countSchema,
    time: z.number().nullish(),
    image_list: z.string().nullish(),
  })
  .passthrough();

type RawItem = z.infer<typeof rawItemSchema>;

type NormalizeOptions = {
  itemUrlTemplate?: string;
  collectedAt?: number;
};

export function buildItemUrl(
  template: string | undefined,
  itemId: string,
): string | null {
  if (!template) {
    return null;
  }
  return template.split('{id}').join(encodeURIComponent(itemId));
}

function toPublishedAt(time: number | null | undefined): string | null {
  if (time === null || time === undefined || !Number.isFinite(time)) {
    return null;
  }

  const date = new Date(time);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function normalizeItem(
  raw: RawItem,
  options?: NormalizeOptions,
): CollectedItem {
  const coverUrl = raw.image_list?.split(',')[0]?.trim() ?? '';

  return {
    id: raw.note_id,
    entityId: raw.user_id,
    title: raw.title ?? '',
    description: raw.desc ?? '',
    kind: raw.type === 'video' ? 'video' : 'image',
    likes: parseCount(raw.liked_count),
    collects: parseCount(raw.collected_count),
    comments: parseCount(raw.comment_count),
    publishedAt: toPublishedAt(raw.time),
    coverUrl,
    url: buildItemUrl(options?.itemUrlTemplate, raw.note_id),
    collectedAt: options?.collectedAt ?? Date.now(),
  };
}

/**
 * Validates and normalizes one raw crawler record. Returns the zod error
 * message for records that cannot be used.
 */
export function parseRawItem(
  value: unknown,
  options?: NormalizeOptions,
): { success: true; item: CollectedItem } | { success: false; error: string } {
  const parsed = rawItemSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      success: false,
      error: issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record',
    };
  }

  return { success: true, item: normalizeItem(parsed.data, options) };
}

export type { NormalizeOptions, RawItem };
