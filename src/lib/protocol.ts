import { z } from "zod"

export type RequestId = string | number

export interface ProtocolRequest {
  id: RequestId
  method: string
  params: unknown
}

export type ProtocolErrorCode =
  | "invalid_request"
  | "method_not_found"
  | "search_failed"
  | "cancelled"
  | "internal_error"

export interface ProtocolSuccess {
  id: RequestId
  result: unknown
}

export interface ProtocolFailure {
  id: RequestId | null
  error: {
    code: ProtocolErrorCode
    message: string
    details?: unknown
  }
}

export type ProtocolResponse = ProtocolSuccess | ProtocolFailure

export type ParsedLine = { ok: true; request: ProtocolRequest } | { ok: false; response: ProtocolFailure }

export const RequestIdSchema = z.union([z.string().min(1).max(200), z.number().int()])

const RequestEnvelopeSchema = z.object({
  id: RequestIdSchema,
  method: z.string().min(1).max(64),
  params: z.unknown().optional(),
})

export function resultResponse(id: RequestId, result: unknown): ProtocolSuccess {
  return { id, result }
}

export function errorResponse(
  id: RequestId | null,
  code: ProtocolErrorCode,
  message: string,
  details?: unknown,
): ProtocolFailure {
  return {
    id,
    error: {
      code,
      message,
      ...(details === undefined ? {} : { details }),
    },
  }
}

export function encodeResponse(response: ProtocolResponse): string {
  return `${JSON.stringify(response)}\n`
}

export function parseRequestLine(line: string): ParsedLine {
  let payload: unknown
  try {
    payload = JSON.parse(line)
  } catch {
    return {
      ok: false,
      response: errorResponse(null, "invalid_request", "Request line is not valid JSON"),
    }
  }

  const parsed = RequestEnvelopeSchema.safeParse(payload)
  if (!parsed.success) {
    return {
      ok: false,
      response: errorResponse(
        salvageId(payload),
        "invalid_request",
        "Invalid request envelope",
        parsed.error.flatten(),
      ),
    }
  }

  return {
    ok: true,
    request: {
      id: parsed.data.id,
      method: parsed.data.method,
      params: parsed.data.params,
    },
  }
}

function salvageId(payload: unknown): RequestId | null {
  if (payload === null || typeof payload !== "object") {
    return null
  }

  const id = RequestIdSchema.safeParse(Reflect.get(payload, "id"))
  return id.success ? id.data : null
}
