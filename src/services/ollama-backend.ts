/**
 * Ollama inference backend
 * Streams /api/chat replies (newline-delimited JSON) chunk by chunk
 */

import { BackendError, errorMessage } from "../shared/errors.js";
import type { ChatMessage, InferenceBackend, InferenceRequest, Logger, QueryKind } from "../types.js";

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  visionModel: string;
  temperature?: number;
  maxTokens?: number;
  numCtx?: number;
  maxRetries?: number;
}

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

interface OllamaChatLine {
  content: string;
  done: boolean;
}

interface OllamaMessage extends ChatMessage {
  images?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Parse one NDJSON line of a streaming /api/chat reply
 */
export function parseChatLine(line: string): OllamaChatLine {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    throw new BackendError(`Malformed stream line: ${line.substring(0, 200)}`);
  }

  if (!isRecord(data)) {
    throw new BackendError(`Unexpected stream line: ${line.substring(0, 200)}`);
  }
  if (typeof data.error === "string") {
    throw new BackendError(`Ollama error: ${data.error}`);
  }

  const message = data.message;
  const content = isRecord(message) && typeof message.content === "string" ? message.content : "";
  return { content, done: data.done === true };
}

export class OllamaBackend implements InferenceBackend {
  private config: Required<OllamaConfig>;
  private logger: Logger;
  private fetchFn: FetchFn;

  constructor(config: OllamaConfig, logger?: Logger, fetchFn?: FetchFn) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ""),
      model: config.model,
      visionModel: config.visionModel,
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens ?? 512,
      numCtx: config.numCtx ?? 2048,
      maxRetries: config.maxRetries ?? 3,
    };
    this.logger = logger || console;
    this.fetchFn = fetchFn || ((input, init) => fetch(input, init));
  }

  modelFor(kind: QueryKind): string {
    return kind === "vision" ? this.config.visionModel : this.config.model;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }
    return error.message.includes("ECONNREFUSED") ||
           error.message.includes("ECONNRESET") ||
           error.message.includes("fetch failed") ||
           error.message.includes("network");
  }

  /**
   * Open the chat stream, retrying connection failures with backoff
   */
  private async connect(body: string, signal: AbortSignal, attempt: number = 1): Promise<Response> {
    try {
      const response = await this.fetchFn(`${this.config.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
        signal,
      });

      if (!response.ok) {
        const text = await response.text().catch(() => "Unknown error");
        throw new BackendError(`Ollama HTTP ${response.status}: ${text.substring(0, 200)}`);
      }
      return response;

    } catch (error) {
      if (error instanceof BackendError) {
        throw error;
      }
      if (!signal.aborted && attempt < this.config.maxRetries && this.isRetryableError(error)) {
        const delay = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
        this.logger.warn(`[Ollama] Retry ${attempt} after ${delay}ms: ${errorMessage(error)}`);
        await this.sleep(delay);
        return this.connect(body, signal, attempt + 1);
      }
      throw new BackendError(`Ollama request failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private buildBody(request: InferenceRequest): string {
    const messages: OllamaMessage[] = request.messages.map((m) => ({ ...m }));
    if (request.image && messages.length > 0) {
      messages[messages.length - 1].images = [request.image];
    }

    return JSON.stringify({
      model: this.modelFor(request.kind),
      messages,
      format: request.format,
      stream: true,
      options: {
        temperature: this.config.temperature,
        num_predict: this.config.maxTokens,
        num_ctx: this.config.numCtx,
      },
    });
  }

  async *startStream(request: InferenceRequest): AsyncGenerator<string> {
    const response = await this.connect(this.buildBody(request), request.signal);
    if (!response.body) {
      throw new BackendError("Ollama response has no body");
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    let finished = false;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          break;
        }

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() || "";

        for (const line of lines) {
          if (line.trim() === "") continue;
          const parsed = parseChatLine(line);
          if (parsed.content) {
            yield parsed.content;
          }
          if (parsed.done) {
            return;
          }
        }
      }

      // Trailing line without newline
      buffer += decoder.decode();
      if (buffer.trim()) {
        const parsed = parseChatLine(buffer);
        if (parsed.content) {
          yield parsed.content;
        }
      }
    } finally {
      if (!finished) {
        reader.cancel().catch((error: unknown) => {
          this.logger.debug(`[Ollama] Stream cancel failed: ${errorMessage(error)}`);
        });
      }
      reader.releaseLock();
    }
  }

  /**
   * Health check: is Ollama reachable and does it list models
   */
  async checkHealth(timeoutMs: number = 5000): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.config.baseUrl}/api/tags`, {
        method: "GET",
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        this.logger.warn(`[Ollama] Health check HTTP ${response.status}`);
        return false;
      }
      const data: unknown = await response.json();
      const models = isRecord(data) && Array.isArray(data.models) ? data.models.length : 0;
      this.logger.info(`[Ollama] Connected - ${models} models available`);
      return true;
    } catch (error) {
      this.logger.error(`[Ollama] Cannot connect: ${errorMessage(error)}`);
      return false;
    }
  }
}
