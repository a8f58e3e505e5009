// ---------------------------------------------------------------------------
// Step and pipeline domain types.
//
// A pipeline is a flat, ordered list of steps sharing one run context: a plain
// object the steps read from and write to during a single run.
// ---------------------------------------------------------------------------

import type {BackgroundProcess, BackgroundRequest, CommandRequest, CommandResult} from '../engine/index.js'
import type {StepRef} from './reporter.js'

export type ExecOptions = Omit<CommandRequest, 'file' | 'args'> & {
  /** When true, a non-zero exit code is returned instead of thrown. */
  allowFailure?: boolean;
  /** When true, output is neither streamed to the reporter nor captured. */
  quiet?: boolean;
}

/** What a step sees while it runs. */
export type StepContext<C> = {
  /** Per-run state shared by the steps of a pipeline. */
  run: C;
  step: StepRef;
  /**
   * Runs a host command, streaming and capturing its output.
   * @throws CommandFailedError on non-zero exit, unless `allowFailure` is set
   */
  exec(file: string, args: string[], options?: ExecOptions): Promise<CommandResult>;
  /** Starts a supervised background process; the step owns the returned handle. */
  spawn(request: BackgroundRequest): BackgroundProcess;
  /** Records an informational line in the step's output. */
  log(line: string): void;
  /** Records a warning line in the step's output. */
  warn(line: string): void;
}

/**
 * A single named unit of provisioning work.
 *
 * The runner checks `precondition` first: when it resolves to true the desired
 * state already holds and `action` is skipped. Otherwise `action` runs and
 * `postcondition`, a predicate or version probe, must resolve to true.
 */
export type Step<C> = {
  id: string;
  /** Human-readable display name. */
  name: string;
  precondition?: (ctx: StepContext<C>) => Promise<boolean>;
  /** Performs the side effect. A returned string is the step's report. */
  action: (ctx: StepContext<C>) => Promise<string | void>;
  postcondition?: (ctx: StepContext<C>) => Promise<boolean>;
}

/** An ordered list of steps. Order is significant and never changed by the runner. */
export type Pipeline<C> = {
  name: string;
  steps: Array<Step<C>>;
}

export type StepStatus = 'done' | 'failed' | 'skipped' | 'would-run'

export type ProvisioningResult = {
  stepId: string;
  stepName: string;
  status: StepStatus;
  /** Output lines captured while the step ran. */
  output: string[];
  report?: string;
  durationMs: number;
  /** Set when status is 'failed'. */
  error?: unknown;
}

export type PipelineRunResult = {
  jobId: string;
  status: 'success' | 'failed';
  results: ProvisioningResult[];
  /** The result that stopped the pipeline. */
  failedStep?: ProvisioningResult;
}
