/*
Purpose: pick hardware test systems for a platform from the machine queue and run images on them.
Assumptions: `mq.sh system-tsv` and `mq.sh pool-tsv` print tab-separated reports with a header row.
*/

import { formatErrorMessage } from "../core/error-format.js";
import { ExternalToolError, NotFoundError, ParseError } from "../core/errors.js";
import { compareIds, type PlatformId, type VariationId } from "../core/ids.js";
import { formatPlatformChoice, parsePlatformChoice } from "../core/platform.js";

import { findAppPath } from "./apps.js";
import { runChecked, type ToolRunner } from "./exec.js";

// =============================================================================
// TYPES
// =============================================================================

export type SystemEntry = {
  platform: PlatformId;
  variation?: VariationId;
};

export type SystemInventory = ReadonlyMap<string, SystemEntry>;
export type PoolInventory = ReadonlyMap<string, ReadonlySet<string>>;

export type TsvReport = {
  headers: string[];
  rows: Array<Map<string, string>>;
};

export type MachineQueueRun = {
  exitPhrase: string;
  /** Images relative to `cwd`, passed with -f in order. */
  files: string[];
  cwd: string;
};

const MACHINE_QUEUE_APP = "mq.sh";

// =============================================================================
// REPORT PARSING
// =============================================================================

/** Rows keyed by header name; cells beyond the header are dropped. */
export function parseTsvReport(output: string, report: string): TsvReport {
  const lines = output.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const headerLine = lines.shift();
  if (headerLine === undefined) {
    throw invalidReport(report);
  }

  const headers = headerLine.split("\t").map((header) => header.trim());
  const rows = lines.map((line) => {
    const cells = line.split("\t");
    const row = new Map<string, string>();
    headers.forEach((header, index) => {
      const cell = cells[index];
      if (cell !== undefined) row.set(header, cell.trim());
    });
    return row;
  });

  return { headers, rows };
}

export function parseSystemReport(output: string): Map<string, SystemEntry> {
  const report = parseTsvReport(output, "system-tsv");
  const systems = new Map<string, SystemEntry>();

  for (const row of report.rows) {
    const name = row.get("name");
    const plat = row.get("sel4_plat");
    if (!name || !plat) continue;

    let choice;
    try {
      choice = parsePlatformChoice(plat);
    } catch (err) {
      if (err instanceof ParseError) {
        throw invalidReport("system-tsv", `system ${name} has platform "${plat}"`, err);
      }
      throw err;
    }
    systems.set(
      name,
      choice.variation === undefined
        ? { platform: choice.platform }
        : { platform: choice.platform, variation: choice.variation },
    );
  }

  return systems;
}

/**
 * Pool report: the `name` column (or the first column) names the pool, every
 * other non-empty cell on the row is a member system.
 */
export function parsePoolReport(output: string): Map<string, Set<string>> {
  const lines = output.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const headerLine = lines.shift();
  if (headerLine === undefined) {
    throw invalidReport("pool-tsv");
  }

  const headers = headerLine.split("\t").map((header) => header.trim());
  const nameIndex = Math.max(headers.indexOf("name"), 0);

  const pools = new Map<string, Set<string>>();
  for (const line of lines) {
    const cells = line.split("\t").map((cell) => cell.trim());
    const name = cells[nameIndex];
    if (!name) continue;

    const members = cells.filter((cell, index) => index !== nameIndex && cell.length > 0);
    pools.set(name, new Set(members));
  }

  return pools;
}

// =============================================================================
// MATCHING
// =============================================================================

/**
 * Candidates for a platform (and variation, when given): every pool made up
 * only of matching systems, then the matching systems themselves in name order.
 */
export function matchSystems(
  platform: PlatformId,
  variation: VariationId | undefined,
  systems: SystemInventory,
  pools: PoolInventory,
): string[] {
  const matching = [...systems.entries()]
    .filter(
      ([, entry]) =>
        entry.platform === platform && (variation === undefined || entry.variation === variation),
    )
    .map(([name]) => name)
    .sort(compareIds);
  const matchingSet = new Set(matching);

  const candidates = [...matching];
  const poolNames = [...pools.keys()].sort(compareIds);
  for (const poolName of poolNames) {
    const members = pools.get(poolName);
    if (!members || members.size === 0) continue;
    if ([...members].every((member) => matchingSet.has(member))) {
      candidates.unshift(poolName);
    }
  }

  if (candidates.length === 0) {
    const requested = formatPlatformChoice({ platform, variation });
    throw new NotFoundError("system", requested, `No matching system found for ${requested}`);
  }

  return candidates;
}

// =============================================================================
// MACHINE QUEUE CLIENT
// =============================================================================

export class MachineQueue {
  constructor(
    private readonly runner: ToolRunner,
    readonly executable: string,
  ) {}

  static async locate(
    runner: ToolRunner,
    env: NodeJS.ProcessEnv = process.env,
  ): Promise<MachineQueue | undefined> {
    const executable = await findAppPath(MACHINE_QUEUE_APP, env);
    return executable ? new MachineQueue(runner, executable) : undefined;
  }

  async systems(): Promise<Map<string, SystemEntry>> {
    const result = await runChecked(this.runner, {
      program: this.executable,
      args: ["system-tsv"],
    });
    return parseSystemReport(result.stdout);
  }

  async pools(): Promise<Map<string, Set<string>>> {
    const result = await runChecked(this.runner, {
      program: this.executable,
      args: ["pool-tsv"],
    });
    return parsePoolReport(result.stdout);
  }

  async candidates(platform: PlatformId, variation?: VariationId): Promise<string[]> {
    const systems = await this.systems();
    const pools = await this.pools();
    return matchSystems(platform, variation, systems, pools);
  }

  runArgs(system: string, run: MachineQueueRun): string[] {
    const args = ["run", "-c", run.exitPhrase, "-s", system];
    for (const file of run.files) {
      args.push("-f", file);
    }
    return args;
  }

  /**
   * Try each candidate in order and stop at the first that exits cleanly.
   * Returns the system that ran the images.
   */
  async runOnFirstAvailable(candidates: string[], run: MachineQueueRun): Promise<string> {
    const failures: string[] = [];
    for (const system of candidates) {
      try {
        const result = await this.runner.run({
          program: this.executable,
          args: this.runArgs(system, run),
          cwd: run.cwd,
          stdio: "inherit",
        });
        if (result.exitCode === 0) {
          return system;
        }
        failures.push(`${system}: exit status ${result.exitCode}`);
      } catch (err) {
        failures.push(`${system}: ${formatErrorMessage(err)}`);
      }
    }

    throw new ExternalToolError(
      MACHINE_QUEUE_APP,
      `Could not run on any available system (${failures.join("; ")})`,
    );
  }
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function invalidReport(report: string, detail?: string, cause?: unknown): ExternalToolError {
  const suffix = detail ? `: ${detail}` : "";
  return new ExternalToolError(
    MACHINE_QUEUE_APP,
    `Invalid output from ${MACHINE_QUEUE_APP} ${report}${suffix}`,
    undefined,
    cause,
  );
}
