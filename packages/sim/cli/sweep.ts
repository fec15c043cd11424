/**
 * Headless sweep run.
 *
 * Usage:
 *   npm run sim
 *   npm run sim -- --individual --rows 8 --columns 12
 *   npm run sim -- --seed 0x<64 hex digits> --fast --quiet
 */
import {
  type AgentController,
  type RunReport,
  buildSimulation,
  consoleLogSink,
  reportRun,
  resolveConfig,
  silentLogSink,
} from "../lib/sweep";
import { parseArgs } from "./args";
import * as clack from "@clack/prompts";

function frame(controller: AgentController): string {
  return `tick ${controller.tickCount}\n${controller.grid.render(controller.agentLocations())}\n`;
}

function formatReport(report: RunReport): string {
  return [
    `outcome       ${report.outcome}`,
    `strategy      ${report.strategy}`,
    `ticks         ${report.ticks}`,
    `seed          ${report.seed}`,
    `map hash      ${report.mapHash}`,
    `positions     ${report.positionsHash}`,
    `violations    ${report.violations.length}`,
  ].join("\n");
}

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  const config = resolveConfig(options.config);

  clack.intro("gridsweep");
  clack.log.info(`seed ${config.seed}`);

  const task = clack.spinner();
  task.start(`Generating a ${config.rows}x${config.cols} grid...`);
  const driver = buildSimulation(config, options.quiet ? silentLogSink : consoleLogSink);
  const { controller } = driver;
  task.stop(`${controller.grid.hazardCount()} hazards, ${config.strategy} agents`);

  if (!options.quiet) console.log(frame(controller));

  while (driver.status === "running") {
    driver.step();
    if (!options.quiet) console.log(frame(controller));
    if (options.delayMs > 0) await new Promise(resolve => setTimeout(resolve, options.delayMs));
  }

  if (driver.fault) {
    clack.log.error(`${driver.fault.message}\n${driver.fault.summary}`);
  }

  const report = reportRun(config, driver);
  clack.note(formatReport(report), "Report");
  clack.outro(report.outcome === "finished" ? "All clean." : `Stopped: ${report.outcome}`);

  return report.outcome === "finished" && report.violations.length === 0 ? 0 : 1;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    clack.cancel(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
