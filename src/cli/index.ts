import { loadConfig, StorageBackend } from "../config";
import { createBackends } from "../core/backends";
import {
  CommandContext,
  runAverage,
  runListDocuments,
  runListFindings,
  runListMetrics,
  runScan,
  runShowDocument,
} from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { TempIntake } from "../processing";
import { FindingType, isFindingType } from "../types";

export type CommandName = "scan" | "documents" | "document" | "findings" | "metrics" | "average";

export interface ParsedCliArgs {
  command: CommandName;
  args: string[];
  configPath?: string;
  backend?: StorageBackend;
  limit?: number;
  offset?: number;
  documentId?: string;
  findingType?: FindingType;
  operation?: string;
  start?: string;
  end?: string;
}

const VALUE_OPTIONS = [
  "--config",
  "--backend",
  "--limit",
  "--offset",
  "--document",
  "--type",
  "--operation",
  "--start",
  "--end",
];

const HELP_TEXT = `
Usage:
  doc-scan <command> [options]

Commands:
  scan <file...>     Validate and scan PDF files
  documents          List documents, newest first
  document <id>      Show one document and its findings
  findings           List findings (--type with paging, or --document alone)
  metrics            List timing metrics (--operation, --document, --start, --end)
  average            Average duration (--operation, --start, --end)

Options:
  --config <path>    Optional path to JSON config file
  --backend <name>   Storage backend: memory | sqlite
  --limit <n>        Page size (1-1000, default 100)
  --offset <n>       Rows to skip
  --type <type>      Finding type: ssn | email
  --document <id>    Restrict to one document
  --operation <op>   Metric operation, e.g. upload or scan
  --start <iso>      Inclusive lower time bound
  --end <iso>        Inclusive upper time bound
  -h, --help         Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (
    raw === "scan" ||
    raw === "documents" ||
    raw === "document" ||
    raw === "findings" ||
    raw === "metrics" ||
    raw === "average"
  ) {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function intOption(argv: string[], name: string): number | undefined {
  const raw = optionValue(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return Number.isFinite(parsed) ? parsed : undefined;
}

function isoOption(argv: string[], name: string): string | undefined {
  const raw = optionValue(argv, name);
  if (!raw) {
    return undefined;
  }
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`${name} expects an ISO-8601 timestamp, got: ${raw}`);
  }
  return parsed.toISOString();
}

function positionals(argv: string[]): string[] {
  const values: string[] = [];
  for (let i = 1; i < argv.length; i += 1) {
    const token = argv[i];
    if (VALUE_OPTIONS.includes(token)) {
      i += 1;
      continue;
    }
    if (token.startsWith("--")) {
      continue;
    }
    values.push(token);
  }
  return values;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const backendRaw = optionValue(argv, "--backend");
  if (backendRaw !== undefined && backendRaw !== "memory" && backendRaw !== "sqlite") {
    throw new Error(`Unsupported backend: ${backendRaw}`);
  }

  const typeRaw = optionValue(argv, "--type");
  if (typeRaw !== undefined && !isFindingType(typeRaw)) {
    throw new Error(`Unsupported finding type: ${typeRaw}`);
  }

  return {
    command,
    args: positionals(argv),
    configPath: optionValue(argv, "--config"),
    backend: backendRaw,
    limit: intOption(argv, "--limit"),
    offset: intOption(argv, "--offset"),
    documentId: optionValue(argv, "--document"),
    findingType: typeRaw,
    operation: optionValue(argv, "--operation"),
    start: isoOption(argv, "--start"),
    end: isoOption(argv, "--end"),
  };
}

async function dispatch(ctx: CommandContext, parsed: ParsedCliArgs): Promise<number> {
  const page = { limit: parsed.limit, offset: parsed.offset };

  switch (parsed.command) {
    case "scan":
      if (parsed.args.length === 0) {
        console.error("scan needs at least one file");
        return 1;
      }
      return runScan(ctx, parsed.args);
    case "documents":
      return runListDocuments(ctx, page);
    case "document":
      if (!parsed.args[0]) {
        console.error("document needs an id");
        return 1;
      }
      return runShowDocument(ctx, parsed.args[0]);
    case "findings":
      return runListFindings(ctx, { ...page, documentId: parsed.documentId, findingType: parsed.findingType });
    case "metrics":
      return runListMetrics(
        ctx,
        { operation: parsed.operation, documentId: parsed.documentId, start: parsed.start, end: parsed.end },
        page,
      );
    case "average":
      return runAverage(ctx, { operation: parsed.operation, start: parsed.start, end: parsed.end });
    default: {
      const unsupported: never = parsed.command;
      console.error(`Unsupported command: ${String(unsupported)}`);
      return 1;
    }
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.backend !== undefined) {
    config = {
      ...config,
      backend: parsed.backend,
    };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  const backends = createBackends(config, logger, metrics);
  const context: CommandContext = {
    runId,
    config,
    backends,
    intake: new TempIntake(config.tempDir),
    logger: logger.child(parsed.command),
    metrics,
  };

  logger.info("command_start", { command: parsed.command, backend: config.backend });

  try {
    const exitCode = await dispatch(context, parsed);
    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    await backends.close();
    metrics.printSummary();
  }
}
