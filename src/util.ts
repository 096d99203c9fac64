export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function hasSuffix(path: string, suffix: string): boolean {
  return path.endsWith(suffix);
}
