#!/usr/bin/env node
import "dotenv/config";

import { createXClients } from "./adapters/x.js";
import { loadConfig } from "./config/index.js";
import { formatRunReport } from "./core/pipeline.js";
import { describeFailure } from "./errors.js";
import { logger } from "./logger.js";
import { runPostOnce } from "./runner.js";
import { runSchedulerDaemon } from "./scheduler.js";
import { createMediaSource } from "./sources/index.js";
import { createDedupStore, createRemoteStoreCopy } from "./state/index.js";

const COMMANDS = "post:run | post:daemon | health:check | store:list";

async function runHealthCheck(): Promise<void> {
  const config = loadConfig();
  const { api } = createXClients(config);
  const source = createMediaSource(config);

  try {
    const account = await api.verifyCredentials();
    logger.info({ username: account.username }, "X credentials accepted");

    const candidates = await source.listCandidates();
    logger.info(
      { source: source.kind, enumerable: source.canEnumerate(), candidates: candidates.length },
      "Media source reachable",
    );

    logger.info("Health check passed");
  } finally {
    await source.close?.();
  }
}

async function runStoreList(): Promise<void> {
  const config = loadConfig();
  const store = createDedupStore(config, createRemoteStoreCopy(config));

  try {
    await store.init();
    const records = await store.listRecords();
    const lines = records.map((record) =>
      [
        record.postedAt || "-",
        record.sourceKind ?? "-",
        record.postId || "-",
        record.name,
      ].join("\t"),
    );
    lines.push(`total: ${records.length}`);
    process.stdout.write(`${lines.join("\n")}\n`);
  } finally {
    await store.close();
  }
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? "post:run";

  if (command === "post:run") {
    const summary = await runPostOnce("cli");
    process.stdout.write(`${formatRunReport(summary)}\n`);
    return;
  }

  if (command === "post:daemon") {
    await runSchedulerDaemon();
    return;
  }

  if (command === "health:check") {
    await runHealthCheck();
    return;
  }

  if (command === "store:list") {
    await runStoreList();
    return;
  }

  throw new Error(`Unknown command: ${command}. Use ${COMMANDS}`);
}

main().catch((error) => {
  logger.error({ err: error, kind: describeFailure(error) }, "Command failed");
  process.exit(1);
});
