/**
 * Zendesk ticket export CLI.
 *
 * Usage:
 *   tsx export.ts                      # tickets created in the last 30 days (bulk variant)
 *   tsx export.ts --mode lastmonth     # previous calendar month
 *   tsx export.ts --sequential         # baseline variant: one comment request at a time
 *   tsx export.ts --concurrency 8      # override [export] concurrency
 *   tsx export.ts --no-cache           # ignore cached users (results are still cached)
 *   tsx export.ts --skip-report        # don't print the API usage report
 *   tsx export.ts --config other.toml  # alternate config file
 */

import "dotenv/config";
import { cacheTtlMs, loadConfig, type Config, type ExportVariant } from "./src/config";
import { FileUserCacheStore, PostgresUserCacheStore, UserCache, type UserCacheStore } from "./src/cache";
import { closeDb } from "./src/db/index";
import { completeExportRun, startExportRun } from "./src/db/queries";
import { USAGE, UsageError, describeFailure, parseCliArgs, type CliOptions } from "./src/cli";
import { errorMessage } from "./src/errors";
import { ExportOrchestrator } from "./src/export/orchestrator";
import { UsageMonitor } from "./src/monitor/usage";
import { formatUsageReport, writeCsvExport } from "./src/report";
import { computeWindow, parseWindowMode, type WindowMode } from "./src/window";
import { countByStatus, createSession, fetchUsersByIds, getZendeskConfig, verifyCredentials } from "./src/zendesk";

function createStore(config: Config): UserCacheStore {
  if (config.cache.backend === "postgres") {
    return new PostgresUserCacheStore(cacheTtlMs(config));
  }
  return new FileUserCacheStore(config.cache.path);
}

function resolveConcurrency(config: Config, variant: ExportVariant, override: number | undefined): number {
  if (variant === "standard") return 1;
  return override ?? config.export.concurrency;
}

async function main(): Promise<number> {
  const startTime = Date.now();

  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`${err.message}\n${USAGE}`);
    return 1;
  }
  const { noCache, skipReport } = cli;

  console.log("=== Zendesk Ticket Export ===\n");

  let config: Config;
  try {
    config = loadConfig(cli.configPath);
  } catch (err) {
    console.error(`Failed to load config.toml: ${errorMessage(err)}`);
    return 1;
  }

  let mode: WindowMode;
  try {
    mode = parseWindowMode(cli.mode);
  } catch (err) {
    console.error(errorMessage(err));
    return 1;
  }

  const clientConfig = getZendeskConfig(config);
  if (!clientConfig) {
    console.error("Zendesk: no credentials found. Set ZENDESK_EMAIL and ZENDESK_API_TOKEN (e.g. in .env)");
    return 1;
  }

  const variant: ExportVariant = cli.sequential ? "standard" : config.export.variant;
  const concurrency = resolveConcurrency(config, variant, cli.concurrency);

  const controller = new AbortController();
  const onInterrupt = () => {
    console.warn("\nInterrupted: abandoning in-flight requests...");
    controller.abort(new Error("Export interrupted"));
  };
  process.once("SIGINT", onInterrupt);

  const monitor = new UsageMonitor();
  const session = createSession({ config: clientConfig, monitor, retry: config.retry, signal: controller.signal });

  const store = createStore(config);
  const userCache = new UserCache((ids) => fetchUsersByIds(session, ids), {
    ttlMs: cacheTtlMs(config),
    maxIdsPerRequest: config.zendesk.max_ids_per_request,
    concurrency,
    bypass: noCache,
    signal: controller.signal,
  });

  try {
    console.log(`Zendesk: ${clientConfig.baseUrl} as ${clientConfig.email}`);
    console.log(`Variant: ${variant} (${concurrency > 1 ? `concurrency ${concurrency}` : "sequential"})`);

    const me = await verifyCredentials(session);
    console.log(`Authenticated as ${me.name ?? me.email ?? `user #${me.id}`}\n`);

    // Seeded even with --no-cache so the saved file keeps users this run doesn't touch
    const loaded = userCache.seed(await store.load());
    console.log(`User cache: ${loaded} fresh entries from ${store.description}${noCache ? " (bypassed, --no-cache)" : ""}`);

    const orchestrator = new ExportOrchestrator({
      session,
      userCache,
      concurrency,
      pageSize: config.zendesk.page_size,
    });

    const now = new Date();
    const runId = config.cache.backend === "postgres" ? await startRunRecord(mode, variant, now) : undefined;

    const result = await orchestrator.run(mode, now);

    const statusCounts = countByStatus(result.tickets);
    if (statusCounts.size > 0) {
      console.log("\nTicket counts by status:");
      for (const [status, count] of statusCounts) {
        console.log(`  - ${status}: ${count}`);
      }
    }

    let outputPath: string | null = null;
    if (result.tickets.length > 0) {
      outputPath = await writeCsvExport(result.rows, config.export.output_dir, result.window.label, variant);
      console.log(`\nExported ${result.tickets.length} tickets (${result.rows.length} rows) to ${outputPath}`);
    } else {
      console.log("\nNo tickets to export.");
    }

    if (result.failures.length > 0) {
      console.warn(`Tickets with comment errors: ${result.failures.map((f) => `#${f.ticketId}`).join(", ")}`);
    }

    await store.save(userCache.snapshot());

    if (runId !== undefined) {
      await completeExportRun(runId, {
        ticketCount: result.tickets.length,
        rowCount: result.rows.length,
        failedTickets: result.failures.length,
        outputPath,
        usage: monitor.summary(),
      });
    }

    if (!skipReport) {
      console.log("\n" + formatUsageReport(monitor.summary(), { cache: userCache.stats(), ttlMs: cacheTtlMs(config) }));
    }

    console.log(`\nTotal script execution time: ${((Date.now() - startTime) / 1000).toFixed(2)} seconds`);
    console.log("Export process completed!");
    return 0;
  } catch (err) {
    const message = describeFailure(err, controller.signal.aborted);
    if (message === null) throw err;
    console.error(message);
    if (!skipReport) {
      console.log("\n" + formatUsageReport(monitor.summary()));
    }
    return 1;
  } finally {
    process.off("SIGINT", onInterrupt);
    if (config.cache.backend === "postgres") await closeDb();
  }
}

async function startRunRecord(mode: WindowMode, variant: ExportVariant, now: Date): Promise<number> {
  const window = computeWindow(mode, now);
  return startExportRun({ mode, variant, windowStart: window.start, windowEnd: window.end });
}

// ── Entry Point ──────────────────────────────────────────────────────────────

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
