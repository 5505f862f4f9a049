import path from "node:path";
import { applyOverrides, AppConfig, ConfigOverrides, loadConfig, toNamingMode } from "../config";
import { CommandContext, runHistory, runIndex, runManifestSync, runStatus } from "../core/commands";
import { FetchFn } from "../core/fetch";
import { loadManifest } from "../manifest";
import { PdfTitleReader } from "../naming";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createArchiveStore } from "../store";

export type CommandName = "sync" | "status" | "history" | "index";

export interface ParsedCliArgs {
  command: CommandName;
  manifestPath: string;
  entryId?: string;
  configPath?: string;
  overrides: ConfigOverrides;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchFn;
  readTitle?: PdfTitleReader;
  signal?: AbortSignal;
}

const DEFAULT_MANIFEST_PATH = "downloads.yaml";

const HELP_TEXT = `
Usage:
  pdf-archiver <command> [options]

Commands:
  sync [manifest]   Download every entry, archive superseded versions.
                    A manifest with a 'downloads' mapping syncs each category
                    into its own folder under the output directory.
  status            Show archive statistics
  history <id>      Show the current file and past versions of an entry
  index             Write index.html listing the current files

Options:
  --manifest <path>        Manifest file, YAML or JSON (default: downloads.yaml)
  --output <dir>           Output directory (default: downloads)
  --concurrency <n>        Max concurrent downloads (default: 4)
  --naming <mode>          by-item | by-title (default: by-item)
  --config <path>          Optional path to JSON config file
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  --index-html             Regenerate index.html after a sync that changed files
  -h, --help               Show this help
`;

const VALUE_FLAGS = new Set(["--manifest", "--output", "--concurrency", "--threads", "--naming", "--config"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "sync" || raw === "status" || raw === "history" || raw === "index") {
    return raw;
  }
  return undefined;
}

function flagValue(argv: string[], ...names: string[]): string | undefined {
  for (const name of names) {
    const index = argv.indexOf(name);
    if (index >= 0 && argv[index + 1] && !argv[index + 1].startsWith("--")) {
      return argv[index + 1];
    }
  }
  return undefined;
}

function positionals(argv: string[]): string[] {
  const values: string[] = [];
  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (VALUE_FLAGS.has(arg)) {
      index += 1;
      continue;
    }
    if (!arg.startsWith("-")) {
      values.push(arg);
    }
  }
  return values;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" | { error: string } {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  if (argv.length === 0) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return { error: `unknown command: ${argv[0]}` };
  }

  const overrides: ConfigOverrides = {};

  const concurrencyRaw = flagValue(argv, "--concurrency", "--threads");
  if (concurrencyRaw !== undefined) {
    const concurrency = Number.parseInt(concurrencyRaw, 10);
    if (!Number.isFinite(concurrency) || concurrency < 1) {
      return { error: `invalid --concurrency value: ${concurrencyRaw}` };
    }
    overrides.concurrency = concurrency;
  }

  const namingRaw = flagValue(argv, "--naming");
  if (namingRaw !== undefined) {
    const namingMode = toNamingMode(namingRaw);
    if (!namingMode) {
      return { error: `invalid --naming value: ${namingRaw} (expected by-item or by-title)` };
    }
    overrides.namingMode = namingMode;
  }

  const outputDir = flagValue(argv, "--output");
  if (outputDir !== undefined) {
    overrides.outputDir = outputDir;
  }
  if (argv.includes("--ignore-https-errors")) {
    overrides.ignoreHttpsErrors = true;
  }
  if (argv.includes("--index-html")) {
    overrides.generateIndexHtml = true;
  }

  const rest = positionals(argv);
  let entryId: string | undefined;
  if (command === "history") {
    entryId = rest[0];
    if (!entryId) {
      return { error: "history requires an entry id" };
    }
  }

  return {
    command,
    manifestPath: flagValue(argv, "--manifest") ?? (command === "sync" ? rest[0] : undefined) ?? DEFAULT_MANIFEST_PATH,
    entryId,
    configPath: flagValue(argv, "--config"),
    overrides,
  };
}

function buildConfig(parsed: ParsedCliArgs, env: NodeJS.ProcessEnv): AppConfig {
  return applyOverrides(loadConfig(parsed.configPath, env), parsed.overrides);
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  if ("error" in parsed) {
    console.error(parsed.error);
    console.error(HELP_TEXT.trim());
    return 1;
  }

  const config = buildConfig(parsed, deps.env ?? process.env);
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId });

  // Rejected manifests stop the run before the output directory is touched.
  const manifest = parsed.command === "sync" ? loadManifest(parsed.manifestPath) : undefined;

  const metrics = new MetricsRegistry();

  logger.info("command_start", {
    command: parsed.command,
    manifestPath: manifest ? parsed.manifestPath : undefined,
    outputDir: path.resolve(config.outputDir),
    categories: manifest?.categories.map((category) => category.name),
    concurrency: config.concurrency,
    namingMode: config.namingMode,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn("cancel_requested");
    controller.abort();
  };
  const onParentAbort = () => controller.abort();
  deps.signal?.addEventListener("abort", onParentAbort, { once: true });
  process.once("SIGINT", onSigint);

  try {
    let exitCode: number;
    if (parsed.command === "sync") {
      if (!manifest) {
        return 1;
      }
      const summaries = await runManifestSync(
        { runId, config, logger: logger.child("sync"), metrics },
        manifest,
        (categoryConfig) => ({
          store: createArchiveStore(categoryConfig),
          sink: createSink(categoryConfig, runId),
        }),
        { signal: controller.signal, fetchFn: deps.fetchFn, readTitle: deps.readTitle },
      );
      exitCode = summaries.some((summary) => summary.failed > 0) ? 1 : 0;
    } else {
      const store = createArchiveStore(config);
      try {
        exitCode = await runArchiveCommand(parsed, {
          runId,
          config,
          store,
          sink: createSink(config, runId),
          logger: logger.child(parsed.command),
          metrics,
        });
      } finally {
        await store.close();
      }
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    process.off("SIGINT", onSigint);
    deps.signal?.removeEventListener("abort", onParentAbort);
    metrics.printSummary();
  }
}

async function runArchiveCommand(parsed: ParsedCliArgs, context: CommandContext): Promise<number> {
  switch (parsed.command) {
    case "status":
      await runStatus(context);
      return 0;
    case "history":
      return (await runHistory(context, parsed.entryId ?? "")) ? 0 : 1;
    case "index":
      await runIndex(context);
      return 0;
    default:
      console.error(`Unsupported command: ${parsed.command}`);
      return 1;
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
