const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"];

export function formatBytes(value: unknown): string {
  const bytes = typeof value === "string" ? Number(value) : value;
  if (typeof bytes !== "number" || !Number.isFinite(bytes)) {
    return "N/A";
  }

  let scaled = bytes;
  for (const unit of BYTE_UNITS) {
    if (scaled < 1024) {
      return `${scaled.toFixed(2)} ${unit}`;
    }
    scaled /= 1024;
  }
  return `${scaled.toFixed(2)} EB`;
}

/** Depth of nested objects and arrays; a scalar is depth 0. */
export function nestingDepth(value: unknown): number {
  if (Array.isArray(value)) {
    return 1 + Math.max(0, ...value.map((item: unknown) => nestingDepth(item)));
  }
  if (typeof value === "object" && value !== null) {
    return 1 + Math.max(0, ...Object.values(value).map((item: unknown) => nestingDepth(item)));
  }
  return 0;
}
