#!/usr/bin/env node
import { z } from 'zod';
import {
  collectArgsSchema,
  resumeArgsSchema,
  runCollectAction,
  runResumeAction,
} from './actions/collect.js';
import { entitiesArgsSchema, runEntitiesAction } from './actions/entities.js';
import { ingestArgsSchema, runIngestAction } from './actions/ingest.js';
import {
  restoreConfigArgsSchema,
  runRestoreConfigAction,
} from './actions/restore-config.js';
import {
  entityIdArgsSchema,
  runItemsAction,
  runProgressAction,
  runRunsAction,
  runStatusAction,
  runsArgsSchema,
  statusArgsSchema,
} from './actions/status.js';

type ParsedArgs = {
  command: string;
  positionals: string[];
  options: Record<string, string>;
};

const optionsSchema = z.record(z.string(), z.string());

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('help'), options: optionsSchema }),
  z.object({ command: z.literal('collect'), options: optionsSchema }),
  z.object({ command: z.literal('resume'), options: optionsSchema }),
  z.object({ command: z.literal('status'), options: optionsSchema }),
  z.object({ command: z.literal('progress'), options: optionsSchema }),
  z.object({ command: z.literal('items'), options: optionsSchema }),
  z.object({ command: z.literal('entities'), options: optionsSchema }),
  z.object({ command: z.literal('ingest'), options: optionsSchema }),
  z.object({ command: z.literal('restore-config'), options: optionsSchema }),
  z.object({ command: z.literal('runs'), options: optionsSchema }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const positionals: string[] = [];
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg) {
      continue;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, positionals, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`creator-collector CLI

Usage:
  cli help
  cli collect --limit=10
  cli collect --tag="home baking" --minFollowers=5000 --target=50 --batchSize=5
  cli resume
  cli resume --limit=20 --includeFailed
  cli status --pretty
  cli status --status=partial,failed --tag="home baking"
  cli progress --id=5f1c2a
  cli items --id=5f1c2a --pretty
  cli entities add --id=5f1c2a --name="Baker" --tags=baking,bread --followers=12000 --target=80
  cli entities add --file=./candidates.json
  cli entities reset --id=5f1c2a --dropItems
  cli entities remove --id=5f1c2a
  cli ingest --dir=./crawler/data/json
  cli ingest --dir=./crawler/data/json --pattern="search_contents_*.json"
  cli restore-config
  cli runs
  cli runs --id=20250101T120000-1a2b3c4d --pretty

Commands:
  help            Show this help message
  collect         Collect items for entities that have never been run
  resume          Continue entities left partial or interrupted
  status          Show entity counts by status and per-entity progress
  progress        Show progress for one entity
  items           Print the items stored for one entity
  entities        Add, reset or remove entities (add | reset | remove)
  ingest          Load crawler result files that already exist, without running the crawler
  restore-config  Restore a crawler configuration left patched by an interrupted run
  runs            List run journals, or print the batches of one run

Common options:
  --config  Settings file (default: $COLLECTOR_CONFIG or ./collector.config.json).
  --pretty  Pretty-print JSON output.

Collect options:
  --limit         Maximum number of entities to run.
  --tag           Only entities carrying this tag.
  --minFollowers  Only entities with at least this many followers. Unknown counts
                  are looked up first; entities still unknown are skipped.
  --target        Override the items target of the selected entities.
  --batchSize     Entities per crawler launch, 1-20 (default from settings).

Resume options:
  --limit          Maximum number of entities to resume.
  --includeFailed  Also retry entities whose last batch crashed.
  --batchSize      Entities per crawler launch, 1-20 (default from settings).

Status options:
  --status  Comma-separated statuses: not_started, in_progress, completed, partial, failed.
  --tag     Only entities carrying this tag.

Entities options:
  --id         Entity id (required for reset and remove).
  --file       JSON array of entities to add ({ id, name?, tags?, followers?, itemsTarget? }).
  --name       Display name for add.
  --tags       Comma-separated tags for add.
  --followers  Follower count for add.
  --target     Items target for add.
  --dropItems  For reset: also delete the stored items.

Ingest options:
  --dir      Directory holding the crawler result files (required).
  --pattern  File name pattern to read (default: artifactPattern from settings).

Exit codes:
  0  Success
  1  Invalid arguments or a failed command
  2  Run halted: the crawler configuration could not be restored
`);
}

function invalidArguments(error: z.ZodError): number {
  console.error(error.issues[0]?.message ?? 'Invalid arguments');
  printHelp();
  return 1;
}

async function main(): Promise<number> {
  const { command, positionals, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  const input = parsedCliInput.data;

  if (input.command === 'help') {
    printHelp();
    return 0;
  }

  if (input.command === 'collect') {
    const parsed = collectArgsSchema.safeParse(input.options);
    return parsed.success ? runCollectAction(parsed.data) : invalidArguments(parsed.error);
  }

  if (input.command === 'resume') {
    const parsed = resumeArgsSchema.safeParse(input.options);
    return parsed.success ? runResumeAction(parsed.data) : invalidArguments(parsed.error);
  }

  if (input.command === 'status') {
    const parsed = statusArgsSchema.safeParse(input.options);
    return parsed.success ? runStatusAction(parsed.data) : invalidArguments(parsed.error);
  }

  if (input.command === 'progress') {
    const parsed = entityIdArgsSchema.safeParse(input.options);
    return parsed.success ? runProgressAction(parsed.data) : invalidArguments(parsed.error);
  }

  if (input.command === 'items') {
    const parsed = entityIdArgsSchema.safeParse(input.options);
    return parsed.success ? runItemsAction(parsed.data) : invalidArguments(parsed.error);
  }

  if (input.command === 'entities') {
    const parsed = entitiesArgsSchema.safeParse({
      ...input.options,
      action: positionals[0],
    });
    if (!parsed.success) {
      if (!['add', 'reset', 'remove'].includes(positionals[0] ?? '')) {
        console.error('Usage: cli entities <add|reset|remove> [options]');
        printHelp();
        return 1;
      }
      return invalidArguments(parsed.error);
    }
    return runEntitiesAction(parsed.data);
  }

  if (input.command === 'ingest') {
    const parsed = ingestArgsSchema.safeParse(input.options);
    return parsed.success ? runIngestAction(parsed.data) : invalidArguments(parsed.error);
  }

  if (input.command === 'restore-config') {
    const parsed = restoreConfigArgsSchema.safeParse(input.options);
    return parsed.success ? runRestoreConfigAction(parsed.data) : invalidArguments(parsed.error);
  }

  if (input.command === 'runs') {
    const parsed = runsArgsSchema.safeParse(input.options);
    return parsed.success ? runRunsAction(parsed.data) : invalidArguments(parsed.error);
  }

  printHelp();
  return 0;
}

const exitCode = await main();
process.exitCode = exitCode;
