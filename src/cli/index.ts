#!/usr/bin/env node
/**
 * CLI entrypoint for scan-drift.
 * Commands: audit, resolve, init
 */

import { existsSync, writeFileSync } from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { DriftAudit, loadConfig, type AuditReport } from "../index.js";
import { identityKey, resolveRepoIdentity } from "../identity/resolver.js";
import { createConsoleLogger } from "../logging/logger.js";

const program = new Command();

program
  .name("scan-drift")
  .description("Reconcile scanning-tool targets and projects against the repository host")
  .version("0.1.0");

function printSummary(report: AuditReport): void {
  const c = report.counts;
  const line = (label: string, value: number, warn = false) =>
    process.stderr.write(`  ${label.padEnd(14)}${warn && value > 0 ? chalk.yellow(String(value)) : value}\n`);

  process.stderr.write(`${chalk.green("Audit complete")} (${report.organizations.length} organizations)\n`);
  line("Matched:", c.matched);
  line("Target-only:", c.targetOnly, true);
  line("Host-only:", c.hostOnly, true);
  line("Unresolvable:", c.unresolvable, true);
  line("Tracked:", c.tracked);
  line("Stale:", c.stale, true);
  line("Untracked:", c.untracked, true);
  line("Duplicates:", c.duplicates, true);
  if (report.accessFailures.length) {
    process.stderr.write(chalk.red(`  Inaccessible orgs: ${report.accessFailures.map((f) => f.orgId).join(", ")}\n`));
  }
  const errors = [...report.catalogErrors, ...report.errors];
  if (errors.length) {
    process.stderr.write(chalk.red(`  Errors: ${errors.length}\n`));
    errors.forEach((e) => process.stderr.write(`    ${e.scope}: ${e.message}\n`));
  }
}

// audit
program
  .command("audit")
  .description("Compare scan coverage with the repository host and report drift as JSON")
  .option("-c, --config <path>", "Config file path")
  .option("--org-id <id>", "Audit a single organization")
  .option("--group-id <id>", "Audit every organization in a group")
  .option("--gitlab-url <url>", "GitLab instance URL")
  .option("-o, --output <file>", "Write the JSON report to a file instead of stdout")
  .option("--log-level <level>", "debug, info, warn or error")
  .action(async (opts: { config?: string; orgId?: string; groupId?: string; gitlabUrl?: string; output?: string; logLevel?: string }) => {
    const config = await loadConfig(opts.config, {
      ...process.env,
      ...(opts.gitlabUrl ? { GITLAB_URL: opts.gitlabUrl } : {}),
      ...(opts.logLevel ? { SCAN_DRIFT_LOG_LEVEL: opts.logLevel } : {}),
    });
    const logger = createConsoleLogger({ level: config.logLevel, color: chalk.level > 0 });
    const audit = new DriftAudit(config, { logger });
    const report = await audit.run({ orgId: opts.orgId, groupId: opts.groupId });

    const json = JSON.stringify(report, null, 2);
    if (opts.output) {
      writeFileSync(opts.output, `${json}\n`, "utf-8");
      process.stderr.write(`Report written to ${opts.output}\n`);
    } else {
      process.stdout.write(`${json}\n`);
    }
    printSummary(report);
  });

// resolve
program
  .command("resolve <reference...>")
  .description("Show how repository references resolve to identities and canonical keys")
  .option("--gitlab-host <host...>", "Additional GitLab hosts")
  .action((references: string[], opts: { gitlabHost?: string[] }) => {
    const results = references.map((reference) => {
      const identity = resolveRepoIdentity(reference, { gitlabHosts: opts.gitlabHost });
      return identity
        ? { reference, key: identityKey(identity), identity }
        : { reference, key: null, identity: null, unresolvable: true };
    });
    process.stdout.write(`${JSON.stringify(results, null, 2)}\n`);
    if (results.some((r) => r.identity === null)) process.exitCode = 1;
  });

// init
program
  .command("init")
  .description("Create a starter scan-drift.config.mjs in the current directory")
  .option("--gitlab-url <url>", "GitLab instance URL", "https://gitlab.com")
  .action((opts: { gitlabUrl: string }) => {
    const file = "scan-drift.config.mjs";
    if (existsSync(file)) {
      console.log(chalk.yellow(`${file} already exists`));
      return;
    }
    const host = new URL(opts.gitlabUrl).host;
    writeFileSync(
      file,
      `// Tokens are read from SNYK_TOKEN and GITLAB_TOKEN when set.
/** @type {import("scan-drift").ScanDriftConfigInput} */
export default {
  snyk: {
    token: process.env.SNYK_TOKEN ?? "",
    region: "SNYK-US-01",
    integrationTypes: ["gitlab", "cli"],
  },
  gitlab: {
    url: "${opts.gitlabUrl}",
  },
  duplicates: { enabled: true, separator: ":" },
  logLevel: "info",
};
`,
      "utf-8"
    );
    console.log(chalk.green(`Created ${file}`));
    console.log(`  GitLab host: ${host}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
