// pattern: Imperative Shell

export type JsonResponse =
  | { readonly success: true; readonly body: unknown }
  | {
      readonly success: false;
      readonly error: string;
      readonly retryable: boolean;
    };

const USER_AGENT = "MorningDigest/1.0 (daily digest mailer)";

/**
 * Issues one GET request and parses the body as JSON.
 * Network errors, timeouts, 429 and 5xx responses are flagged retryable;
 * other non-2xx statuses and unparseable bodies are not.
 */
export async function getJson(
  url: URL,
  timeoutMs: number,
): Promise<JsonResponse> {
  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "application/json",
      },
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message, retryable: true };
  }

  if (!response.ok) {
    return {
      success: false,
      error: `HTTP ${response.status}: ${response.statusText}`,
      retryable: response.status === 429 || response.status >= 500,
    };
  }

  try {
    const body: unknown = await response.json();
    return { success: true, body };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: `invalid JSON body: ${message}`,
      retryable: false,
    };
  }
}
