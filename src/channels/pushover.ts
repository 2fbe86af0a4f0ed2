// ============================================
// Pushover Notifier
// ============================================

import { describeError } from "../core/errors.js";

const PUSHOVER_URL = "https://api.pushover.net/1/messages.json";
const TIMEOUT_MS = 10_000;

/** Outbound, fire-and-forget notification channel used by the tools. */
export interface Notifier {
  notify(message: string): Promise<void>;
}

export class PushoverNotifier implements Notifier {
  constructor(
    private readonly token: string,
    private readonly user: string,
    private readonly url: string = PUSHOVER_URL,
    private readonly timeoutMs: number = TIMEOUT_MS,
  ) {}

  /** Post the message. Delivery problems are logged, never thrown. */
  async notify(message: string): Promise<void> {
    if (!this.token || !this.user) {
      console.log(`[Pushover] (not configured) ${message}`);
      return;
    }

    const body = new URLSearchParams({
      token: this.token,
      user: this.user,
      message,
    });

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`Timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);

    try {
      // The race bounds the call even if the request ignores the abort.
      await Promise.race([this.deliver(body, controller.signal), rejectOnAbort(controller.signal)]);
    } catch (err) {
      console.warn("[Pushover] Failed to send notification:", describeError(err));
    } finally {
      clearTimeout(timer);
    }
  }

  private async deliver(body: URLSearchParams, signal: AbortSignal): Promise<void> {
    const res = await fetch(this.url, { method: "POST", body, signal });
    if (!res.ok) {
      const text = await res.text();
      console.warn(`[Pushover] HTTP ${res.status}: ${text.slice(0, 200)}`);
    }
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
