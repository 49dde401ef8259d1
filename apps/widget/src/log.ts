// Diagnostics for the widget CLI. Stdout carries the protocol, so every
// diagnostic line goes to the error sink.

export type LineSink = (line: string) => void;

export type WidgetLog = {
  info(message: string): void; // Written only when verbose.
  fail(message: string): void; // Always written.
};

export function createWidgetLog(sink: LineSink, verbose: boolean): WidgetLog {
  return {
    info: (message) => {
      if (verbose) sink(`INFO: ${message}`);
    },
    fail: (message) => {
      sink(`FAIL: ${message}`);
    }
  };
}
