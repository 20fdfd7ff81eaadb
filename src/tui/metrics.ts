export function emitMetric(
  enabled: boolean,
  name: string,
  fields: Record<string, string | number | boolean | undefined>,
): void {
  if (!enabled) {
    return;
  }

  console.info(`[metric] ${name} ${JSON.stringify(fields)}`);
}
