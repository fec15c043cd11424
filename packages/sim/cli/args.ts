import type { SimulationConfig } from "../lib/sweep";
import { DEFAULT_TICK_DELAY_MS } from "../lib/sweep/constants";
import { isHex } from "viem";

export type CliOptions = {
  config: Partial<SimulationConfig>;
  // Pause between frames
  delayMs: number;
  quiet: boolean;
};

export const USAGE = `Usage: npm run sim -- [options]
  -i, --individual       decentralized agents (default: centralized A*)
  -y, --rows N           grid rows (default 6)
  -x, --columns N        grid columns (default 10)
  -d, --delta S          seconds between ticks (default 0.5)
  -s, --seed 0x..        32-byte hex seed (default: random)
      --bins N           number of bins (default 1)
      --walls P          percent of cells that are walls (default 0)
      --random-start     place agents at random open cells
      --fast             no delay between ticks
  -q, --quiet            only print the final report`;

/**
 * Parse command-line flags. Unknown flags and malformed values throw, with USAGE as the hint.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const config: Partial<SimulationConfig> = {};
  let delayMs = DEFAULT_TICK_DELAY_MS;
  let fast = false;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = (): string => {
      const next = argv[++i];
      if (next === undefined) throw new Error(`${flag} needs a value\n${USAGE}`);
      return next;
    };

    switch (flag) {
      case "-i":
      case "--individual":
        config.strategy = "decentralized";
        break;
      case "-y":
      case "--rows":
        config.rows = integer(flag, value());
        break;
      case "-x":
      case "--columns":
        config.cols = integer(flag, value());
        break;
      case "-d":
      case "--delta":
        delayMs = Math.round(number(flag, value()) * 1000);
        break;
      case "-s":
      case "--seed": {
        const seed = value();
        if (!isHex(seed, { strict: true })) throw new Error(`${flag} expects 0x-prefixed hex, got "${seed}"`);
        config.seed = seed;
        break;
      }
      case "--bins":
        config.binCount = integer(flag, value());
        break;
      case "--walls":
        config.wallPercent = number(flag, value());
        break;
      case "--random-start":
        config.start = "random";
        break;
      case "--fast":
        fast = true;
        break;
      case "-q":
      case "--quiet":
        quiet = true;
        break;
      default:
        throw new Error(`Unknown option "${flag}"\n${USAGE}`);
    }
  }

  return { config, delayMs: fast ? 0 : delayMs, quiet };
}

function number(flag: string, raw: string): number {
  const parsed = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${flag} expects a non-negative number, got "${raw}"`);
  }
  return parsed;
}

function integer(flag: string, raw: string): number {
  const parsed = number(flag, raw);
  if (!Number.isInteger(parsed)) throw new Error(`${flag} expects a whole number, got "${raw}"`);
  return parsed;
}
