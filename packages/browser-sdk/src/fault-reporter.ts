export interface HostFault {
  /** Where the fault was caught. */
  context: string;
  message: string;
  name?: string;
  stack?: string;
}

export type FaultReporter = (fault: HostFault) => void;

let installedReporter: FaultReporter | null = null;

/**
 * Install the process-wide fault reporter. Only the first call takes effect;
 * returns whether this call installed it.
 */
export function installFaultReporter(reporter: FaultReporter): boolean {
  if (installedReporter) return false;
  installedReporter = reporter;
  return true;
}

export function hasFaultReporter(): boolean {
  return installedReporter !== null;
}

/** Report an unexpected failure to the host. Falls back to the console. */
export function reportFault(error: unknown, context: string): void {
  const fault: HostFault =
    error instanceof Error
      ? { context, message: error.message, name: error.name, stack: error.stack }
      : { context, message: String(error) };

  if (!installedReporter) {
    console.error(`[EventClient] ${context}:`, error);
    return;
  }
  try {
    installedReporter(fault);
  } catch (reporterError) {
    console.error('[EventClient] fault reporter failed:', reporterError, fault);
  }
}
