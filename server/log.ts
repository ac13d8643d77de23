export function log(message: string, source = "telemetry") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
