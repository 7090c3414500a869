export type ArtifactKind = "text" | "image";

export type OutputTarget = {
  textHandle: string | null;  // remote id of the live summary message
  imageHandle: string | null; // remote id of the live chart message
};

export type SerializedState = {
  history: Array<[string, number]>;
  targets: Record<string, OutputTarget>;
};

export const DESTINATION_ID = /^[A-Za-z0-9_-]+$/;

// key used for files written with a single, unnamed destination
export const SINGLE_DESTINATION_ID = "default";
