import { Command } from "commander";
import { classifyMemory, explainClassification, shouldRequestManualClassification } from "@/classify";
import { getConfig } from "@/config";
import { startServer } from "@/http/server";
import { log } from "@/logger";
import { parseContext, parseDate, parseNumber } from "@/cli/options";
import { normalizeCategory } from "@/memory/context";
import { MemoryError } from "@/memory/errors";
import type { MemoryService } from "@/memory/service";
import { MEMORY_CATEGORIES } from "@/memory/types";
import type { SearchHit } from "@/memory/types";
import { version, BUILD } from "@/meta/version";
import { createRuntime } from "@/runtime";

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function formatHit(hit: SearchHit, rank: number): string {
  const when = hit.record.timestamp.slice(0, 10);
  return `${rank}. [${hit.collection}] ${hit.adjustedScore.toFixed(3)} (raw ${hit.rawScore.toFixed(3)}) ${when}  ${hit.record.text}`;
}

/** Runs one command against a fresh runtime and reports known failures without a stack trace. */
async function withService(fn: (service: MemoryService) => Promise<void>): Promise<void> {
  const runtime = createRuntime();
  try {
    await fn(runtime.service);
  } catch (error) {
    if (!(error instanceof MemoryError)) throw error;
    console.error(`error: ${error.code}: ${error.message}`);
    process.exitCode = 1;
  } finally {
    runtime.close();
  }
}

const program = new Command();

program.name(version.name).description("Episodic/semantic memory classification and retrieval").version(version.master);

program
  .command("serve")
  .description("Start the HTTP API")
  .option("-p, --port <port>", "port to listen on", parseNumber(1, 65535, true))
  .option("--host <host>", "interface to bind")
  .action((opts: { port?: number; host?: string }) => {
    const config = getConfig();
    const runtime = createRuntime(config);
    startServer(
      runtime.service,
      { host: opts.host ?? config.server.host, port: opts.port ?? config.server.port },
      () => runtime.close(),
    );
  });

program
  .command("classify")
  .description("Classify a text as episodic or semantic memory")
  .argument("<text>", "text to classify")
  .option("-c, --context <json>", 'hints, e.g. {"speaker":"alice","fact_type":"profile"}')
  .action((text: string, opts: { context?: string }) => {
    try {
      const result = classifyMemory(text, parseContext(opts.context));
      printJson({
        ...result,
        explanation: explainClassification(result),
        needsManualReview: shouldRequestManualClassification(result, getConfig().classifier.manualThreshold),
      });
    } catch (error) {
      if (!(error instanceof MemoryError)) throw error;
      console.error(`error: ${error.code}: ${error.message}`);
      process.exitCode = 1;
    }
  });

program
  .command("remember")
  .description("Store a memory, classifying it unless a category is given")
  .argument("<text>", "memory text")
  .requiredOption("-u, --user <id>", "user id")
  .option("--category <category>", "episodic, semantic or auto", "auto")
  .option("--speaker <name>", "who said it")
  .option("--fact-type <type>", "explicit fact type")
  .option("--conversation <id>", "conversation id")
  .action(async (text: string, opts: { user: string; category: string; speaker?: string; factType?: string; conversation?: string }) => {
    await withService(async (service) => {
      const result = await service.remember({
        userId: opts.user,
        text,
        category: opts.category === "auto" ? "auto" : normalizeCategory(opts.category),
        context: { speaker: opts.speaker, factType: opts.factType, conversationId: opts.conversation },
      });
      printJson(result);
    });
  });

program
  .command("search")
  .description("Search a user's memories across collections")
  .argument("<query>", "query text")
  .requiredOption("-u, --user <id>", "user id")
  .option("--collections <list>", "comma-separated collections", MEMORY_CATEGORIES.join(","))
  .option("-l, --limit <n>", "number of results", parseNumber(1, 100, true))
  .option("--episodic-weight <w>", "episodic collection weight", parseNumber(0, 2))
  .option("--semantic-weight <w>", "semantic collection weight", parseNumber(0, 2))
  .option("--query-weights", "derive weights from the query's own classification")
  .option("--decay", "blend in recency")
  .option("--reference-time <iso>", "measure recency from this time instead of now (implies --decay)", parseDate)
  .option("--json", "print raw JSON")
  .action(async (
    query: string,
    opts: {
      user: string;
      collections: string;
      limit?: number;
      episodicWeight?: number;
      semanticWeight?: number;
      queryWeights?: boolean;
      decay?: boolean;
      referenceTime?: Date;
      json?: boolean;
    },
  ) => {
    await withService(async (service) => {
      const options = {
        collections: opts.collections.split(",").map((c) => normalizeCategory(c.trim())),
        limit: opts.limit,
        weights: { episodic: opts.episodicWeight, semantic: opts.semanticWeight },
        decay: opts.decay || opts.referenceTime ? { referenceTime: opts.referenceTime } : false,
      };
      const result = opts.queryWeights
        ? await service.searchWithQueryWeights(query, opts.user, options)
        : await service.searchMulti(query, opts.user, options);
      if (opts.json) {
        printJson(result);
        return;
      }
      if (result.hits.length === 0) console.log("no memories found");
      result.hits.forEach((hit, i) => console.log(formatHit(hit, i + 1)));
      for (const failure of result.failures) console.error(`! ${failure.collection}: ${failure.error}`);
    });
  });

program
  .command("stats")
  .description("Show per-category memory counts for a user")
  .requiredOption("-u, --user <id>", "user id")
  .action(async (opts: { user: string }) => {
    await withService(async (service) => printJson(await service.getUserSummary(opts.user)));
  });

program
  .command("forget-user")
  .description("Delete a user's memories")
  .requiredOption("-u, --user <id>", "user id")
  .option("--category <category>", "only this collection")
  .option("--force", "confirm deletion")
  .action(async (opts: { user: string; category?: string; force?: boolean }) => {
    if (!opts.force) {
      console.error("refusing to delete without --force");
      process.exitCode = 1;
      return;
    }
    await withService(async (service) => {
      const category = opts.category ? normalizeCategory(opts.category) : undefined;
      printJson(await service.deleteUserMemories(opts.user, category));
    });
  });

program
  .command("collections")
  .description("Show collection statistics")
  .action(async () => {
    await withService(async (service) => {
      printJson(await Promise.all(MEMORY_CATEGORIES.map((category) => service.getCollectionStats(category))));
    });
  });

program
  .command("version")
  .description("Show version information")
  .action(() => {
    console.log(`${version.name} ${version.master} (${BUILD})`);
  });

program.parseAsync().catch((error: unknown) => {
  log.error({ err: error }, "command failed");
  process.exitCode = 1;
});
