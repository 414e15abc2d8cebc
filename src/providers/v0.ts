import { errorMessage } from "../errors";

export const V0_API_URL = "https://api.v0.dev/v1/chat/completions";
export const V0_DEFAULT_MODEL = "v0-1.0-md";

export class V0ApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`API Error (${status}): ${body}`);
    this.name = "V0ApiError";
  }
}

export class V0TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "V0TimeoutError";
  }
}

export class V0NetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "V0NetworkError";
  }
}

export type FetchFn = typeof fetch;

export type StreamLine = { type: "content"; content: string } | { type: "done" };

export type V0StreamRequest = {
  apiKey: string;
  prompt: string;
  model?: string;
  apiUrl?: string;
  /** Longest pause allowed between two chunks of the response. */
  timeoutMs?: number;
  onContent?: (chunk: string) => void;
  fetchImpl?: FetchFn;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deltaContent(payload: unknown): string {
  if (!isRecord(payload) || !Array.isArray(payload.choices) || payload.choices.length === 0) {
    return "";
  }
  const [first] = payload.choices;
  if (!isRecord(first) || !isRecord(first.delta)) {
    return "";
  }
  return typeof first.delta.content === "string" ? first.delta.content : "";
}

/** Parses one server-sent-event line; null for anything that carries no content. */
export function parseStreamLine(line: string): StreamLine | null {
  if (!line.startsWith("data: ")) {
    return null;
  }
  const data = line.slice("data: ".length);
  if (data.trim() === "[DONE]") {
    return { type: "done" };
  }
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch {
    return null;
  }
  const content = deltaContent(payload);
  return content ? { type: "content", content } : null;
}

function describeNetworkError(error: unknown): string {
  const base = errorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${base}: ${errorMessage(error.cause)}`;
  }
  return base;
}

/**
 * Sends one user message with `stream: true` and returns the concatenated delta content.
 * Each piece is also handed to `onContent` as soon as it arrives.
 */
export async function streamChatCompletion(request: V0StreamRequest): Promise<string> {
  const fetchImpl = request.fetchImpl ?? fetch;
  const timeoutMs = request.timeoutMs ?? 60_000;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const armTimer = (): void => {
    if (timer) {
      clearTimeout(timer);
    }
    timer = setTimeout(() => controller.abort(), timeoutMs);
  };
  const failure = (error: unknown): Error =>
    controller.signal.aborted ? new V0TimeoutError(timeoutMs) : new V0NetworkError(describeNetworkError(error));

  armTimer();
  try {
    const response = await fetchImpl(request.apiUrl ?? V0_API_URL, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${request.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        model: request.model ?? V0_DEFAULT_MODEL,
        messages: [{ role: "user", content: request.prompt }],
        stream: true
      }),
      signal: controller.signal
    }).catch((error: unknown) => {
      throw failure(error);
    });

    if (!response.ok) {
      throw new V0ApiError(response.status, await response.text());
    }
    const reader = response.body?.getReader();
    if (!reader) {
      throw new V0NetworkError("Response has no body");
    }

    const decoder = new TextDecoder();
    let buffer = "";
    let full = "";
    const consume = (line: string): boolean => {
      const parsed = parseStreamLine(line.replace(/\r$/, ""));
      if (!parsed) {
        return false;
      }
      if (parsed.type === "done") {
        return true;
      }
      full += parsed.content;
      request.onContent?.(parsed.content);
      return false;
    };

    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        throw failure(error);
      });
      if (chunk.done) {
        break;
      }
      armTimer();
      buffer += decoder.decode(chunk.value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (consume(line)) {
          await reader.cancel();
          return full;
        }
      }
    }
    buffer += decoder.decode();
    if (buffer) {
      consume(buffer);
    }
    return full;
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
