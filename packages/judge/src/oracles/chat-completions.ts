import { isPlainObject, type DecisionOracle, type OracleReply } from "@pretool-judge/core";

export type ChatCompletionsOracleOptions = {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  fetchImpl?: typeof fetch;
};

export const DEFAULT_CHAT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
const ERROR_BODY_LIMIT = 300;

// OpenAI-compatible /chat/completions client. Turns map 1:1 onto messages.
export function createChatCompletionsOracle(options: ChatCompletionsOracleOptions): DecisionOracle {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `${(options.baseUrl ?? DEFAULT_CHAT_BASE_URL).replace(/\/+$/, "")}/chat/completions`;
  const model = options.model ?? DEFAULT_CHAT_MODEL;
  return {
    async send(turns, sendOptions) {
      let res: Response;
      try {
        res = await fetchImpl(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${options.apiKey}`
          },
          body: JSON.stringify({
            model,
            temperature: 0,
            messages: turns.map((turn) => ({ role: turn.role, content: turn.content }))
          }),
          signal: sendOptions?.signal ?? null
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, error: `request to ${url} failed: ${message}` };
      }
      if (!res.ok) {
        const body = await readBody(res);
        return { ok: false, error: `HTTP ${res.status}${body ? `: ${body.slice(0, ERROR_BODY_LIMIT)}` : ""}` };
      }
      let data: unknown;
      try {
        data = await res.json();
      } catch {
        return { ok: false, error: "response body is not JSON" };
      }
      return readCompletion(data);
    }
  };
}

export function readCompletion(data: unknown): OracleReply {
  if (!isPlainObject(data) || !Array.isArray(data.choices)) {
    return { ok: false, error: "response has no choices" };
  }
  const first: unknown = data.choices[0];
  if (!isPlainObject(first) || !isPlainObject(first.message)) {
    return { ok: false, error: "response has no message" };
  }
  const content = first.message.content;
  if (typeof content !== "string") {
    return { ok: false, error: "response message has no text content" };
  }
  return { ok: true, text: content };
}

async function readBody(res: Response): Promise<string> {
  try {
    return (await res.text()).trim();
  } catch (err) {
    return err instanceof Error ? `(unreadable body: ${err.message})` : "(unreadable body)";
  }
}
