import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { EntityInput, EntityRecord } from '../store/types.js';
import { loadCollectorContext, withRunLock, type CollectorContext } from './context.js';
import {
  commonOptionsSchema,
  flagOption,
  integerOption,
  listOption,
  requiredIdOption,
  textOption,
} from './options.js';
import { printResult, reportFailure } from './report.js';

const entityInputSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().optional(),
  tags: z.array(z.string()).optional(),
  followers: z.number().int().nonnegative().nullable().optional(),
  itemsTarget: z.number().int().positive().optional(),
});

const entityFileSchema = z.array(entityInputSchema);

const entitiesArgsSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('add'),
    id: textOption('id'),
    file: textOption('file'),
    name: textOption('name'),
    tags: listOption('tags'),
    followers: integerOption('followers', 0),
    target: integerOption('target', 1),
    ...commonOptionsSchema.shape,
  }),
  z.object({
    action: z.literal('reset'),
    id: requiredIdOption(),
    dropItems: flagOption(),
    ...commonOptionsSchema.shape,
  }),
  z.object({
    action: z.literal('remove'),
    id: requiredIdOption(),
    ...commonOptionsSchema.shape,
  }),
]).superRefine((args, ctx) => {
  if (args.action === 'add' && args.id === undefined && args.file === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Provide --id or --file for entities add',
    });
  }
});

type EntitiesArgs = z.infer<typeof entitiesArgsSchema>;

export function readEntityFile(path: string): EntityInput[] {
  const parsed = entityFileSchema.safeParse(
    JSON.parse(readFileSync(resolve(path), 'utf-8')),
  );
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid entity file ${path}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown problem'}`,
    );
  }
  return parsed.data;
}

export function applyEntitiesCommand(
  context: Pick<CollectorContext, 'store' | 'lock'>,
  args: EntitiesArgs,
): EntityRecord[] | { removed: boolean } {
  const { store, lock } = context;

  return withRunLock(lock, `entities-${args.action}`, () => {
    if (args.action === 'add') {
      const inputs: EntityInput[] = args.file ? readEntityFile(args.file) : [];
      if (args.id) {
        inputs.push({
          id: args.id,
          name: args.name,
          tags: args.tags,
          followers: args.followers,
          itemsTarget: args.target,
        });
      }
      return inputs.map((input) => store.upsertEntity(input));
    }

    if (args.action === 'reset') {
      return [store.resetEntity(args.id, { dropItems: args.dropItems })];
    }

    return { removed: store.removeEntity(args.id) };
  });
}

export function runEntitiesAction(args: EntitiesArgs): number {
  try {
    const context = loadCollectorContext(args.config);
    printResult(applyEntitiesCommand(context, args), args.pretty);
    return 0;
  } catch (error) {
    return reportFailure(`entities ${args.action}`, error);
  }
}

export { entitiesArgsSchema };
export type { EntitiesArgs };
