import type { SmokeReporter } from '../core/reporter.js';
import type { PlannedStep, SmokeRun, StepResult } from '../types/index.js';

/**
 * Reporter that keeps everything it is told, for assertions
 */
export class RecordingReporter implements SmokeReporter {
  started: PlannedStep[] = [];
  passed: StepResult[] = [];
  failed: StepResult[] = [];
  notes: string[] = [];
  echoed: Array<{ label: string; body: string }> = [];
  finished: SmokeRun | null = null;

  runStarted(): void {}

  stepStarted(step: PlannedStep): void {
    this.started.push(step);
  }

  stepPassed(_step: PlannedStep, result: StepResult): void {
    this.passed.push(result);
  }

  stepFailed(_step: PlannedStep, result: StepResult): void {
    this.failed.push(result);
  }

  note(message: string): void {
    this.notes.push(message);
  }

  json(label: string, body: string): void {
    this.echoed.push({ label, body });
  }

  runFinished(run: SmokeRun): void {
    this.finished = run;
  }
}
