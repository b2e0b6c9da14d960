export interface GraphResponse {
  ok: boolean;
  id?: string;
  errorMessage?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Graph API bodies carry either an `id` or an `error: { message }` object. */
export function readGraphResponse(ok: boolean, body: unknown): GraphResponse {
  if (!isRecord(body)) {
    return { ok };
  }
  const id = typeof body.id === 'string' || typeof body.id === 'number' ? String(body.id) : undefined;
  const error = isRecord(body.error) && typeof body.error.message === 'string' ? body.error.message : undefined;
  return { ok, id, errorMessage: error };
}
