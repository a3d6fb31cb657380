import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { cacheDir, projectPaths, registryPath, resolveHome } from '../config/paths.js';
import { resolveSettings } from '../config/settings.js';
import { PipelineError, errorMessage } from '../control-plane/errors.js';
import { emitOutputs, runPipeline, type ReportFormat } from '../control-plane/orchestrator.js';
import type { PipelineSettings, ProgressEvent, Project, RunState } from '../control-plane/types.js';
import { OpenAiEmbeddingService } from '../providers/embedding.js';
import { OpenAiLlmService } from '../providers/llm.js';
import { renderMarkdown } from '../report/markdown.js';
import { buildReport } from '../report/report.js';
import { ProjectRegistry } from '../state/project-registry.js';
import { RunStateStore } from '../state/run-state.js';
import { ContentCache } from '../tools/cache.js';
import { generateRunId } from '../utils/id.js';
import { consoleLogger } from '../utils/logger.js';
import { formatProgress } from './progress.js';

interface GlobalOptions {
  home?: string;
}

interface ProjectAddOptions {
  regulation: string;
  procedures: string[];
}

interface RunOptions {
  topK?: number;
  concurrency?: number;
  out: string;
  format: string;
  fresh?: boolean;
}

interface ReportOptions {
  format: string;
  out: string;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

function reportFormat(value: string): ReportFormat {
  if (value === 'md' || value === 'json') return value;
  throw new Error(`unknown format "${value}" (expected md or json)`);
}

async function requireProject(registry: ProjectRegistry, idOrName: string): Promise<Project> {
  const project = await registry.get(idOrName);
  if (!project) {
    throw new Error(`unknown project "${idOrName}" (see: regaudit project list)`);
  }
  return project;
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('regaudit')
    .description(
      'Regulatory compliance auditor.\n\n' +
      'Checks internal procedure documents against the clauses of an external regulation\n' +
      'and records a resumable, per-clause verdict with cited evidence.'
    )
    .version('0.1.0')
    .option('--home <dir>', 'Storage root (default: $REGAUDIT_HOME or ~/.regaudit)');

  const home = (): string => resolveHome(program.opts<GlobalOptions>().home);
  const registry = (): ProjectRegistry => new ProjectRegistry(registryPath(home()));

  const project = program.command('project').description('Manage audit projects');

  project
    .command('add')
    .description('Register a regulation file and its procedure documents as a project')
    .argument('<name>', 'Project name')
    .requiredOption('--regulation <file>', 'Regulation clauses (JSON)')
    .requiredOption('--procedures <files...>', 'Procedure documents (.txt, .md, .html, .pdf)')
    .action(async (name: string, opts: ProjectAddOptions) => {
      const added = await registry().add({
        name,
        regulationPath: opts.regulation,
        procedurePaths: opts.procedures,
      });
      console.log(`[regaudit] added project ${added.id} (${added.procedurePaths.length} procedure document(s))`);
    });

  project
    .command('list')
    .description('List registered projects')
    .action(async () => {
      const projects = await registry().list();
      if (projects.length === 0) {
        console.log('[regaudit] no projects registered');
        return;
      }
      for (const p of projects) {
        console.log(`  ${p.id}  ${p.name}  (${p.procedurePaths.length} procedure document(s), created ${p.createdAt})`);
      }
    });

  project
    .command('remove')
    .description('Remove a project from the registry (its run state is kept)')
    .argument('<project>', 'Project id or name')
    .action(async (idOrName: string) => {
      const removed = await registry().remove(idOrName);
      if (!removed) throw new Error(`unknown project "${idOrName}"`);
      console.log(`[regaudit] removed project ${removed.id}`);
    });

  program
    .command('run')
    .description('Run or resume the compliance pipeline for a project')
    .argument('<project>', 'Project id or name')
    .option('--top-k <n>', 'Chunks retrieved per audit task', positiveInt)
    .option('--concurrency <n>', 'Provider calls in flight per stage', positiveInt)
    .option('--out <dir>', 'Output directory for the ledger and report', './out')
    .option('--format <format>', 'Report format: md or json', 'md')
    .option('--fresh', 'Discard the saved run state and start over')
    .action(async (idOrName: string, opts: RunOptions) => {
      const root = home();
      const target = await requireProject(registry(), idOrName);
      const format = reportFormat(opts.format);
      const settings = resolveSettings(process.env, { topK: opts.topK, concurrency: opts.concurrency });
      if (!settings.apiKey) {
        throw new Error('OPENAI_API_KEY is not set (export it or put it in .env)');
      }

      const paths = projectPaths(root, target.id);
      if (opts.fresh && new RunStateStore(paths.runState, consoleLogger).clear()) {
        console.log(`[regaudit] cleared saved run state for ${target.id}`);
      }
      await runCommand(target, settings, settings.apiKey, root, opts.out, format);
    });

  program
    .command('report')
    .description('Write the compliance report for the saved run state')
    .argument('<project>', 'Project id or name')
    .option('--format <format>', 'Report format: md or json', 'md')
    .option('--out <dir>', 'Output directory', './out')
    .action(async (idOrName: string, opts: ReportOptions) => {
      const root = home();
      const target = await requireProject(registry(), idOrName);
      const format = reportFormat(opts.format);
      const state = new RunStateStore(projectPaths(root, target.id).runState, consoleLogger).load(target.id);
      const report = buildReport(target, state);

      await mkdir(opts.out, { recursive: true });
      const path = join(opts.out, `${target.id}-report.${format}`);
      await writeFile(path, format === 'md' ? renderMarkdown(report) : JSON.stringify(report, null, 2));
      console.log(`[regaudit] report written to ${path}${report.complete ? '' : ' (partial run)'}`);
    });

  program
    .command('cache')
    .description('Manage the global content cache')
    .command('clear')
    .description('Delete every cached embedding and model response')
    .action(() => {
      const dir = cacheDir(home());
      new ContentCache(dir).clear();
      console.log(`[regaudit] cleared cache at ${dir}`);
    });

  program
    .command('state')
    .description('Manage saved run state')
    .command('clear')
    .description("Delete a project's saved run state")
    .argument('<project>', 'Project id or name')
    .action(async (idOrName: string) => {
      const target = await requireProject(registry(), idOrName);
      const cleared = new RunStateStore(projectPaths(home(), target.id).runState, consoleLogger).clear();
      console.log(cleared ? `[regaudit] cleared run state for ${target.id}` : `[regaudit] no run state for ${target.id}`);
    });

  return program;
}

async function runCommand(
  project: Project,
  settings: Readonly<PipelineSettings>,
  apiKey: string,
  home: string,
  out: string,
  format: ReportFormat
): Promise<void> {
  const runId = generateRunId();
  const paths = projectPaths(home, project.id);
  const events: ProgressEvent[] = [];
  const controller = new AbortController();
  const onSigint = (): void => {
    console.log('\n[regaudit] cancellation requested; finishing in-flight calls...');
    controller.abort();
  };

  console.log(`\n[regaudit] run=${runId} project=${project.id}`);
  console.log(
    `[regaudit] models=${settings.models.needCheck}/${settings.models.auditPlan}/${settings.models.judge} ` +
    `embedding=${settings.models.embedding} topK=${settings.topK} concurrency=${settings.concurrency}\n`
  );

  process.once('SIGINT', onSigint);
  let state: RunState;
  try {
    state = await runPipeline(
      project,
      settings,
      (event) => {
        events.push(event);
        const line = formatProgress(event);
        if (line) console.log(line);
      },
      {
        llm: new OpenAiLlmService({ apiKey, baseUrl: settings.baseUrl }),
        embedder: new OpenAiEmbeddingService({ apiKey, baseUrl: settings.baseUrl }),
        cache: new ContentCache(cacheDir(home)),
        paths,
        logger: consoleLogger,
        signal: controller.signal,
      }
    );
  } catch (err) {
    const message = errorMessage(err);
    const saved = new RunStateStore(paths.runState, consoleLogger).load(project.id);
    const outputs = await emitOutputs(out, runId, project, saved, events, format, message);
    console.error(`\n[regaudit] FATAL: ${message}`);
    console.error(`[regaudit] ledger written to ${outputs.ledgerPath}`);
    printRemediation(err);
    process.exit(2);
  } finally {
    process.off('SIGINT', onSigint);
  }

  const outputs = await emitOutputs(out, runId, project, state, events, format);
  const { verdicts, failedItems, providerCalls } = outputs.ledger;
  console.log(
    `[regaudit] compliant=${verdicts.compliant} non_compliant=${verdicts.non_compliant} ` +
    `inconclusive=${verdicts.inconclusive} no_evidence=${verdicts.no_evidence} ` +
    `failed=${failedItems.length} provider_calls=${providerCalls}`
  );
  console.log(`[regaudit] done. Output written to ${out}/${state.completedAt ? '' : ' (partial; rerun to resume)'}`);
}

function printRemediation(err: unknown): void {
  console.error('\n[regaudit] Remediation suggestions:');
  const kind = err instanceof PipelineError ? err.kind : 'internal';
  if (kind === 'persistence') {
    console.error('  - Check free disk space and write permission on the storage root (--home)');
    console.error('  - Results flushed before the failure are kept; rerun to resume');
  } else if (kind === 'ingestion') {
    console.error('  - Check the regulation file path and that it is JSON with a "clauses" array');
    console.error('  - Update the project with: regaudit project remove <id> && regaudit project add ...');
  } else {
    console.error('  - Rerun the command; completed work is reused from the saved state and cache');
    console.error(`  - Details: ${errorMessage(err)}`);
  }
}
