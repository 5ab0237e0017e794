import { z } from "zod";
import { logger } from "../config/logger.js";
import { fail, ok, type BackendConfig, type StageResult } from "../types/index.js";

export interface InvokeOptions {
  /** File the prompt was built from; tags any error. */
  sourceFile: string;
  /** Aborts the call; reported as Cancelled rather than retried. */
  signal?: AbortSignal;
  fetch?: typeof fetch;
}

const generateReplySchema = z.object({ response: z.string() });
const errorReplySchema = z.object({ error: z.string() });

/**
 * Resolve the generate endpoint for a host. Bare "host:port" values get an
 * http:// scheme, the way OLLAMA_HOST is usually written.
 */
export function resolveGenerateUrl(host: string): URL | undefined {
  const trimmed = host.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  try {
    const base = new URL(withScheme.endsWith("/") ? withScheme : `${withScheme}/`);
    if (base.protocol !== "http:" && base.protocol !== "https:") return undefined;
    return new URL("api/generate", base);
  } catch {
    return undefined;
  }
}

function describeFetchError(err: unknown): string {
  if (err instanceof Error) {
    return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message;
  }
  return String(err);
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

/**
 * Send one prompt to the backend and buffer the whole reply. Never retries:
 * a timeout is reported as BackendTimeout and the caller decides.
 */
export async function invokeBackend(
  prompt: string,
  backend: BackendConfig,
  options: InvokeOptions
): Promise<StageResult<string>> {
  const { sourceFile, signal } = options;
  const fetchImpl = options.fetch ?? fetch;

  const url = resolveGenerateUrl(backend.host);
  if (!url) {
    return fail("BackendUnavailable", sourceFile, `Invalid backend host: "${backend.host}"`);
  }
  if (signal?.aborted) {
    return fail("Cancelled", sourceFile, "Batch was cancelled before the backend call");
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, backend.timeoutMs);
  const onCallerAbort = () => controller.abort();
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const exchange = async () => {
      const response = await fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: backend.model,
          prompt,
          stream: false,
          options: { temperature: 0 },
        }),
        signal: controller.signal,
      });
      return { status: response.status, ok: response.ok, body: await response.text() };
    };
    const reply = await Promise.race([exchange(), rejectOnAbort(controller.signal)]);

    let json: unknown;
    try {
      json = JSON.parse(reply.body);
    } catch {
      json = undefined;
    }

    if (!reply.ok) {
      const detail = errorReplySchema.safeParse(json);
      const reason = detail.success ? detail.data.error : reply.body.slice(0, 200);
      return fail("BackendUnavailable", sourceFile, `Backend returned HTTP ${reply.status}: ${reason}`);
    }

    const parsed = generateReplySchema.safeParse(json);
    if (!parsed.success) {
      return fail("BackendUnavailable", sourceFile, "Backend reply did not contain a response text");
    }
    return ok(parsed.data.response);
  } catch (err) {
    if (timedOut) {
      logger.warn({ file: sourceFile, timeoutMs: backend.timeoutMs }, "Backend call timed out");
      return fail("BackendTimeout", sourceFile, `No backend response within ${backend.timeoutMs} ms`);
    }
    if (signal?.aborted) {
      return fail("Cancelled", sourceFile, "Batch was cancelled during the backend call");
    }
    const message = describeFetchError(err);
    logger.warn({ file: sourceFile, host: url.origin, error: message }, "Backend unavailable");
    return fail("BackendUnavailable", sourceFile, `Backend request to ${url.origin} failed: ${message}`);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onCallerAbort);
  }
}
