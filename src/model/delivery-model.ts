import { Destination } from "./config-env";

export type RemoteResult<T> =
  | { kind: "ok"; value: T }
  | { kind: "notFound"; detail: string }
  | { kind: "transientError"; detail: string };

export type PinResult = "pinned" | "ignored";

export type ReconcileOutcome = {
  action: "created" | "edited" | "healed" | "skipped" | "failed";
  handleChanged: boolean;
};

export interface Messenger {
  createText(destination: Destination, content: string): Promise<RemoteResult<string>>;
  editText(destination: Destination, handle: string, content: string): Promise<RemoteResult<void>>;
  createImage(destination: Destination, image: Uint8Array, caption: string): Promise<RemoteResult<string>>;
  editImage(
    destination: Destination,
    handle: string,
    image: Uint8Array,
    caption: string,
  ): Promise<RemoteResult<void>>;
  deleteMessage(destination: Destination, handle: string): Promise<RemoteResult<void>>;
  pin(destination: Destination, handle: string): Promise<RemoteResult<PinResult>>;
}
