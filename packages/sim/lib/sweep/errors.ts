/**
 * Stop-the-world fault: something threw inside tick().
 *
 * The controller has already rolled back to the last committed tick by the time the driver
 * wraps the error, so `summary` describes the state the run will resume from.
 */
export class SimulationFault extends Error {
  readonly tick: number;
  readonly seed: string | null;
  readonly summary: string;

  constructor(cause: unknown, context: { tick: number; seed: string | null; summary: string }) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Simulation fault at tick ${context.tick}: ${reason}`, { cause });
    this.name = "SimulationFault";
    this.tick = context.tick;
    this.seed = context.seed;
    this.summary = context.summary;
  }
}
