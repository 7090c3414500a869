import { Destination } from "../model/config-env";
import { Messenger, ReconcileOutcome, RemoteResult } from "../model/delivery-model";
import { ArtifactKind, OutputTarget } from "../model/state-model";

type HandleField = "textHandle" | "imageHandle";

type ArtifactOps = {
  kind: ArtifactKind;
  field: HandleField;
  create: () => Promise<RemoteResult<string>>;
  edit: (handle: string) => Promise<RemoteResult<void>>;
  onDelivered?: () => void;
};

const FAILED: ReconcileOutcome = { action: "failed", handleChanged: false };

/**
 * Makes the remote text and image messages of a target match the desired content.
 *
 * create when no handle is known, edit otherwise, and when the edit reports the
 * message gone, forget the handle and create a fresh one within the same call.
 * Callers persist the state when `handleChanged` is set.
 */
export class OutputReconciler {
  // advisory; a stale entry costs one redundant edit
  private readonly lastRendered = new Map<string, string>();

  constructor(private readonly messenger: Messenger) {}

  lastRenderedText(destinationId: string): string | undefined {
    return this.lastRendered.get(destinationId);
  }

  forget(destinationId: string): void {
    this.lastRendered.delete(destinationId);
  }

  async reconcileText(
    destination: Destination,
    target: OutputTarget,
    text: string,
    opts?: { force?: boolean },
  ): Promise<ReconcileOutcome> {
    if (
      !opts?.force &&
      target.textHandle !== null &&
      this.lastRendered.get(destination.id) === text
    ) {
      return { action: "skipped", handleChanged: false };
    }

    return this.upsert(destination, target, {
      kind: "text",
      field: "textHandle",
      create: () => this.messenger.createText(destination, text),
      edit: (handle) => this.messenger.editText(destination, handle, text),
      onDelivered: () => this.lastRendered.set(destination.id, text),
    });
  }

  async reconcileImage(
    destination: Destination,
    target: OutputTarget,
    image: Uint8Array,
    caption: string,
  ): Promise<ReconcileOutcome> {
    return this.upsert(destination, target, {
      kind: "image",
      field: "imageHandle",
      create: () => this.messenger.createImage(destination, image, caption),
      edit: (handle) => this.messenger.editImage(destination, handle, image, caption),
    });
  }

  private async upsert(
    destination: Destination,
    target: OutputTarget,
    ops: ArtifactOps,
  ): Promise<ReconcileOutcome> {
    const handle = target[ops.field];
    if (handle === null) {
      return this.create(destination, target, ops, "created");
    }

    const res = await ops.edit(handle);
    if (res.kind === "ok") {
      ops.onDelivered?.();
      return { action: "edited", handleChanged: false };
    }
    if (res.kind === "transientError") {
      console.warn(
        `[reconcile] ${ops.kind} edit for ${destination.id} failed, retrying next cycle: ${res.detail}`,
      );
      return FAILED;
    }

    console.warn(
      `[reconcile] stored ${ops.kind} message ${handle} for ${destination.id} is not accessible, creating a new one (${res.detail})`,
    );
    target[ops.field] = null;
    if (ops.kind === "text") this.forget(destination.id);

    const outcome = await this.create(destination, target, ops, "healed");
    // the cleared handle must reach disk even when the re-create failed
    return { action: outcome.action, handleChanged: true };
  }

  private async create(
    destination: Destination,
    target: OutputTarget,
    ops: ArtifactOps,
    action: "created" | "healed",
  ): Promise<ReconcileOutcome> {
    const res = await ops.create();
    if (res.kind !== "ok") {
      console.error(
        `[reconcile] failed to create ${ops.kind} message for ${destination.id}: ${res.detail}`,
      );
      return FAILED;
    }
    target[ops.field] = res.value;
    ops.onDelivered?.();
    return { action, handleChanged: true };
  }
}
