#!/usr/bin/env node
/**
 * Main entry point for the role tracker.
 * Parses the configuration, runs one collection pass against VRChat and
 * Discord, and writes the snapshot. Any failure exits with code 2 and
 * leaves no snapshot behind.
 *
 * @module index
 */

import dotenv from "dotenv";
import { RoleTracker } from "./aggregator/RoleTracker";
import { loadConfig, parseArgs, usage } from "./helpers/configHelper";
import { logger } from "./helpers/cliHelper";
import { FATAL_EXIT_CODE, TrackerError } from "./helpers/errors";
import { resolveOutputDirectory } from "./helpers/fileHelper";
import { SnapshotExporter } from "./plugins/exporters/SnapshotExporter";
import { DiscordRoleSource } from "./plugins/sources/DiscordRoleSource";
import { VrcApiClient } from "./plugins/sources/VrcApiClient";

dotenv.config();

/**
 * Runs the tracker once.
 * @returns the process exit code
 */
export async function main(argv: readonly string[], signal?: AbortSignal): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(usage());
    return 0;
  }

  const config = loadConfig(args);
  const outputPath = resolveOutputDirectory(config.workspace, config.output);

  const tracker = new RoleTracker({
    config,
    vrc: new VrcApiClient({
      username: config.username,
      password: config.password,
      totpKey: config.totpKey,
      userAgent: process.env.VRC_USER_AGENT
    }),
    chat: config.discord ? new DiscordRoleSource({ botToken: config.discord.botToken }) : undefined,
    signal
  });

  const data = await tracker.run();
  new SnapshotExporter({ outputPath }).export(data);
  logger.success('Done!');
  return 0;
}

/**
 * Maps a failure to log lines and the fatal exit code.
 */
export function reportFailure(error: unknown): number {
  if (error instanceof TrackerError) {
    logger.error(`${error.kind} error: ${error.message}`);
    if (error.status !== undefined) {
      logger.error(`Status Code: ${error.status}`);
    }
    if (error.cause instanceof Error && error.cause.stack) {
      logger.debug(error.cause.stack);
    }
    return error.exitCode;
  }

  logger.error(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  return FATAL_EXIT_CODE;
}

if (require.main === module) {
  const controller = new AbortController();
  const interrupt = () => {
    logger.warning('Interrupt received, stopping at the next safe point...');
    controller.abort();
  };
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  main(process.argv.slice(2), controller.signal)
    .then(code => process.exit(code))
    .catch(error => process.exit(reportFailure(error)));
}
