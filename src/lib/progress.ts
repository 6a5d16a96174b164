import ora from "ora";

export interface ProgressReporter {
  start(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

/** One ora spinner per phase; only a single phase runs at a time. */
export function createSpinnerReporter(): ProgressReporter {
  let spinner: ora.Ora | undefined;
  return {
    start(text) {
      spinner = ora(`${text}...`).start();
    },
    succeed(text) {
      spinner?.succeed(text);
      spinner = undefined;
    },
    fail(text) {
      spinner?.fail(text);
      spinner = undefined;
    }
  };
}
