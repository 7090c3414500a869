import { z } from "zod";

import { Destination } from "../model/config-env";
import { Messenger, PinResult, RemoteResult } from "../model/delivery-model";
import { describeError } from "./errors";

const CHART_FILENAME = "index_chart.png";

const MessageResponse = z.object({ id: z.string() });

type FetchLike = typeof fetch;

function webhookUrl(destination: Destination, handle?: string): URL {
  const url = new URL(destination.webhookUrl);
  if (handle) {
    url.pathname = `${url.pathname.replace(/\/+$/, "")}/messages/${handle}`;
  } else {
    url.searchParams.set("wait", "true");
  }
  return url;
}

function imageForm(image: Uint8Array, caption: string): FormData {
  const form = new FormData();
  form.append(
    "payload_json",
    JSON.stringify({
      content: caption,
      attachments: [{ id: 0, filename: CHART_FILENAME }],
      allowed_mentions: { parse: [] },
    }),
  );
  form.append("files[0]", new Blob([image], { type: "image/png" }), CHART_FILENAME);
  return form;
}

function textBody(content: string): RequestInit {
  return {
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ content, allowed_mentions: { parse: [] } }),
  };
}

/**
 * Delivers messages through Discord webhooks.
 *
 * 404 and other client errors map to `notFound` (the message or the webhook is gone
 * or unusable); rate limits, server errors and network failures are `transientError`.
 */
export class DiscordMessenger implements Messenger {
  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  async createText(destination: Destination, content: string): Promise<RemoteResult<string>> {
    const res = await this.request(webhookUrl(destination), { method: "POST", ...textBody(content) });
    return res.kind === "ok" ? this.readId(res.value) : res;
  }

  async editText(
    destination: Destination,
    handle: string,
    content: string,
  ): Promise<RemoteResult<void>> {
    const res = await this.request(webhookUrl(destination, handle), {
      method: "PATCH",
      ...textBody(content),
    });
    return res.kind === "ok" ? { kind: "ok", value: undefined } : res;
  }

  async createImage(
    destination: Destination,
    image: Uint8Array,
    caption: string,
  ): Promise<RemoteResult<string>> {
    const res = await this.request(webhookUrl(destination), {
      method: "POST",
      body: imageForm(image, caption),
    });
    return res.kind === "ok" ? this.readId(res.value) : res;
  }

  async editImage(
    destination: Destination,
    handle: string,
    image: Uint8Array,
    caption: string,
  ): Promise<RemoteResult<void>> {
    const res = await this.request(webhookUrl(destination, handle), {
      method: "PATCH",
      body: imageForm(image, caption),
    });
    return res.kind === "ok" ? { kind: "ok", value: undefined } : res;
  }

  async deleteMessage(destination: Destination, handle: string): Promise<RemoteResult<void>> {
    const res = await this.request(webhookUrl(destination, handle), { method: "DELETE" });
    return res.kind === "ok" ? { kind: "ok", value: undefined } : res;
  }

  // Webhooks have no pin permission.
  async pin(_destination: Destination, _handle: string): Promise<RemoteResult<PinResult>> {
    return { kind: "ok", value: "ignored" };
  }

  private async request(url: URL, init: RequestInit): Promise<RemoteResult<string>> {
    let res: Response;
    try {
      res = await this.fetchImpl(url.toString(), init);
    } catch (err) {
      return { kind: "transientError", detail: describeError(err) };
    }

    const text = await res.text().catch(() => "");
    if (res.ok) return { kind: "ok", value: text };

    const detail = `Discord webhook ${init.method ?? "GET"} failed: ${res.status} ${text}`.trim();
    if (res.status >= 400 && res.status < 500 && res.status !== 429) {
      return { kind: "notFound", detail };
    }
    return { kind: "transientError", detail };
  }

  // The message was posted but cannot be tracked; the caller creates another next cycle.
  private readId(body: string): RemoteResult<string> {
    let detail = "webhook response has no message id";
    try {
      const parsed = MessageResponse.safeParse(JSON.parse(body));
      if (parsed.success) return { kind: "ok", value: parsed.data.id };
    } catch (err) {
      detail = `unreadable webhook response: ${describeError(err)}`;
    }
    console.error(`[discord] message posted without a usable id, it will stay untracked: ${detail}`);
    return { kind: "transientError", detail };
  }
}
