#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig, ConfigError } from "./lib/config.js";
import { CLI_NAME, CLI_VERSION } from "./lib/branding.js";
import { FAILED_STEP } from "./constants/build_codes.js";
import { AcquireError } from "./lib/acquire.js";
import { StageError } from "./lib/stage.js";
import { VersionError } from "./lib/version.js";
import { workingCopyPath } from "./lib/paths.js";

const program = new Command();

// Global config option
let globalConfigPath: string | undefined;

program
  .name(CLI_NAME)
  .description("Fetch, stage and version the htpcgui package install tree")
  .version(CLI_VERSION)
  .option("-c, --config <path>", "Path to configuration file")
  .hook("preAction", (thisCommand) => {
    globalConfigPath = thisCommand.opts<{ config?: string }>().config;
  });

/**
 * Prints a step failure and exits 1. Errors that are not step failures are
 * rethrown to the top-level handler.
 */
function exitOnStepError(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(1);
  }
  if (error instanceof AcquireError) {
    console.error(`${FAILED_STEP.ACQUIRE_FAILED} failed: ${error.message}`);
    process.exit(1);
  }
  if (error instanceof StageError) {
    console.error(`${FAILED_STEP.STAGE_FAILED} failed: ${error.message}`);
    process.exit(1);
  }
  if (error instanceof VersionError) {
    console.error(`${FAILED_STEP.VERSION_FAILED} failed: ${error.message}`);
    process.exit(1);
  }
  throw error;
}

program
  .command("init")
  .description("Write a default configuration file in the current directory")
  .requiredOption("--url <url>", "Remote repository URL")
  .option("-f, --force", "Overwrite an existing configuration file")
  .action(async (options: { url: string; force?: boolean }) => {
    try {
      const { initCommand } = await import("./commands/init.js");
      await initCommand({ url: options.url, force: options.force });
    } catch (error) {
      console.error(`Failed to initialize: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

program
  .command("build")
  .description("Fetch the source, stage the files and write package metadata")
  .option("--skip-fetch", "Use the existing working copy without pulling")
  .option("--json", "Output the build report as JSON")
  .action(async (options: { skipFetch?: boolean; json?: boolean }) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { runBuild } = await import("./runner/build.js");
      const report = await runBuild(config, { skipFetch: options.skipFetch });

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else if (report.ok) {
        console.log(`${report.package_name} ${report.version ?? ""}-${config.package.release}`);
        if (report.acquire) {
          console.log(`  source: ${report.acquire.action} ${report.acquire.target_dir} @ ${report.acquire.head_after}`);
        }
        for (const file of report.staged) {
          console.log(`  staged: ${file.dest_path} (${file.size} bytes)`);
        }
        if (report.pkginfo_path) {
          console.log(`  metadata: ${report.pkginfo_path}`);
        }
        console.log(`  duration: ${report.duration_ms}ms`);
      }

      for (const warning of report.warnings) {
        console.error(`Warning: ${warning}`);
      }

      if (report.code !== "SUCCESS") {
        console.error(`${FAILED_STEP[report.code]} failed: ${report.error ?? "unknown error"}`);
        process.exit(1);
      }
    } catch (error) {
      exitOnStepError(error);
    }
  });

program
  .command("fetch")
  .description("Clone or update the working copy")
  .action(async () => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { runFetch } = await import("./runner/build.js");
      const result = runFetch(config);
      console.log(`${result.action} ${result.target_dir}`);
      if (result.head_before && result.head_before !== result.head_after) {
        console.log(`  ${result.head_before.slice(0, 7)}..${result.head_after.slice(0, 7)}`);
      } else {
        console.log(`  HEAD ${result.head_after.slice(0, 7)}`);
      }
      if (result.dirty) {
        console.error(`Warning: local modifications before update: ${result.dirty_files.join(", ")}`);
      }
    } catch (error) {
      exitOnStepError(error);
    }
  });

program
  .command("stage")
  .description("Copy the configured files from the working copy into the install root")
  .action(async () => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { runStage, checkStagedGuiConfig } = await import("./runner/build.js");
      const staged = await runStage(config);
      for (const file of staged) {
        console.log(`staged: ${file.dest_path} (${file.size} bytes, sha256 ${file.sha256})`);
      }
      for (const warning of await checkStagedGuiConfig(staged, config.staging.install_root)) {
        console.error(`Warning: ${warning}`);
      }
    } catch (error) {
      exitOnStepError(error);
    }
  });

program
  .command("version")
  .description("Print the package version derived from the working copy's tags")
  .action(async () => {
    try {
      const config = await loadConfig(globalConfigPath);
      const { resolveVersion } = await import("./lib/version.js");
      console.log(resolveVersion(workingCopyPath(config)).version);
    } catch (error) {
      exitOnStepError(error);
    }
  });

program
  .command("doctor")
  .description("Diagnose configuration, git and working copy")
  .action(async () => {
    console.log(`${CLI_NAME} doctor - checking configuration and environment\n`);

    const { runDoctor } = await import("./lib/doctor.js");
    const result = await runDoctor(globalConfigPath);

    for (const check of result.checks) {
      console.log(`[${check.status.toUpperCase()}] ${check.message}`);
    }

    console.log("\n--- Summary ---");
    if (result.issues.length === 0) {
      console.log("All checks passed.");
    } else {
      console.log(`Found ${result.issues.length} issue(s):\n`);
      for (const issue of result.issues) {
        console.log(`  - ${issue}`);
      }
      process.exit(1);
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
