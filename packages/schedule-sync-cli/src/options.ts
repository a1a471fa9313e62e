export type GlobalOptions = {
  config: string;
  schedule: string;
  credentials: string;
  token: string;
  serviceAccountKey?: string;
  authPort: string;
  dryRun: boolean;
  clear: boolean;
  markDone?: string;
  date?: string;
};

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`--auth-port must be a port number, got ${value}`);
  }
  return port;
}

/** Flag combinations commander cannot express on its own; null when the options are usable. */
export function usageProblem(options: Pick<GlobalOptions, "markDone" | "date">): string | null {
  if (options.date !== undefined && options.markDone === undefined) {
    return "option '--date <yyyy-mm-dd>' can only be used with '--mark-done <name>'";
  }
  return null;
}
