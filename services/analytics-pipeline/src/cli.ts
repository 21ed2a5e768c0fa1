import { Command } from 'commander';
import { z } from 'zod';
import {
  AnalyticsDatabase,
  ConfigurationError,
  FREQUENCY_BASES,
  PipelineSettings,
  SERVICE_NAMES,
  VERSION,
  createServiceLogger,
  describeError,
  errorLogger,
  isValidMemoryLimit,
  loadConfig,
  toPipelineSettings,
} from '@shopper-insights/shared';
import { PipelineRunner, STAGES } from './services/PipelineRunner';
import { normalizeCutoff } from './services/PropensityDatasetBuilder';

const logger = createServiceLogger(SERVICE_NAMES.ANALYTICS_PIPELINE);

// Flags arrive as strings; anything left out keeps the environment value
const cliOptionsSchema = z.object({
  db: z.string().min(1).optional(),
  memoryLimit: z.string().refine(isValidMemoryLimit, 'expected a size such as 4GB').optional(),
  threads: z.coerce.number().int().positive().optional(),
  minSupport: z.coerce.number().int().positive().optional(),
  minLift: z.coerce.number().nonnegative().optional(),
  frequencyBasis: z.enum(FREQUENCY_BASES).optional(),
  source: z.string().min(1).optional(),
  cutoff: z.string().optional(),
});

export type CliOptions = z.input<typeof cliOptionsSchema>;

export function applyOverrides(settings: PipelineSettings, raw: unknown): PipelineSettings {
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `--${toFlag(issue.path.join('.'))}: ${issue.message}`);
    throw new ConfigurationError(`Invalid options: ${issues.join('; ')}`, { issues });
  }
  const options = parsed.data;
  return {
    ...settings,
    databasePath: options.db ?? settings.databasePath,
    memoryLimit: options.memoryLimit ?? settings.memoryLimit,
    threads: options.threads ?? settings.threads,
    minSupport: options.minSupport ?? settings.minSupport,
    minLift: options.minLift ?? settings.minLift,
    rfmFrequencyBasis: options.frequencyBasis ?? settings.rfmFrequencyBasis,
    rawEventsPath: options.source ?? settings.rawEventsPath,
    propensityCutoff: options.cutoff ? normalizeCutoff(options.cutoff) : settings.propensityCutoff,
  };
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

function withPipelineOptions(command: Command): Command {
  return command
    .option('--db <path>', 'Database file')
    .option('--memory-limit <size>', 'Engine memory ceiling, e.g. 4GB')
    .option('--threads <count>', 'Engine thread ceiling')
    .option('--min-support <count>', 'Minimum co-purchase sessions for an affinity pair')
    .option('--min-lift <value>', 'Affinity rules must have lift above this')
    .option('--frequency-basis <basis>', `RFM frequency definition (${FREQUENCY_BASES.join(' | ')})`)
    .option('--source <path>', 'Raw events file or glob for ingest')
    .option('--cutoff <date>', 'Propensity split date, YYYY-MM-DD');
}

async function execute(stages: readonly string[], options: unknown): Promise<void> {
  const settings = applyOverrides(toPipelineSettings(loadConfig()), options);
  const db = await AnalyticsDatabase.open({
    path: settings.databasePath,
    memoryLimit: settings.memoryLimit,
    threads: settings.threads,
  });

  try {
    const result = await new PipelineRunner(db, settings).run(stages);
    for (const stage of result.stages) {
      console.log(`${stage.stage.padEnd(20)} ${String(stage.durationMs).padStart(8)}ms  ${JSON.stringify(stage.rowCounts)}`);
    }
  } finally {
    await db.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('shopper-insights')
    .description('Behavioral analytics pipeline over an embedded DuckDB database')
    .version(VERSION);

  withPipelineOptions(
    program
      .command('run')
      .description('Run the given stages in pipeline order, or every stage when none are named')
      .argument('[stages...]', 'Stage names')
  ).action(async (stages: string[], options: unknown) => {
    await execute(stages, options);
  });

  for (const stage of STAGES) {
    withPipelineOptions(program.command(stage.name).description(stage.description)).action(async (options: unknown) => {
      await execute([stage.name], options);
    });
  }

  program
    .command('stages')
    .description('List pipeline stages with their inputs and outputs')
    .action(() => {
      for (const stage of STAGES) {
        const requires = stage.requires.length > 0 ? stage.requires.join(', ') : '(raw events)';
        console.log(`${stage.name.padEnd(20)} ${requires} -> ${stage.produces.join(', ')}`);
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      errorLogger.logError(error, { argv: process.argv.slice(2) }, logger);
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
