/**
 * Shared helpers for responses, sizes and timing
 */

/**
 * CORS headers attached to every response
 */
export function getCORSHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, HEAD, OPTIONS',
    'Access-Control-Allow-Headers': 'If-None-Match',
    'Access-Control-Expose-Headers': 'ETag, X-Cache-Status',
  };
}

/**
 * JSON error body with CORS headers
 */
export function errorResponse(message: string, status: number, code?: string): Response {
  return new Response(JSON.stringify(code ? { error: message, code } : { error: message }), {
    status,
    headers: {
      'Content-Type': 'application/json',
      'Cache-Control': 'no-store',
      ...getCORSHeaders(),
    },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body, null, 2), {
    status,
    headers: {
      'Content-Type': 'application/json',
      ...getCORSHeaders(),
    },
  });
}

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

/**
 * Parse a human file size ("50MB", "512 kb", "1048576") into bytes
 *
 * @throws Error if the value is not a non-negative size
 */
export function parseFileSize(value: string): number {
  const match = /^\s*(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)?\s*$/i.exec(value);
  if (!match) {
    throw new Error(`Invalid file size: ${value}`);
  }
  const unit = (match[2] || 'B').toUpperCase();
  return Math.floor(parseFloat(match[1]) * SIZE_UNITS[unit]);
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
