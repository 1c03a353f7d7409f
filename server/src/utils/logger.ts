/** The console subset the pipeline and importer write diagnostics to. */
export type Logger = Pick<Console, "log" | "warn" | "error">;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
