export type ApplyStatus =
  | "pending"
  | "applying"
  | "applied"
  | "failed"
  | "blocked"
  | "skipped";

export type ApplyEvent = AnnotateEvent | StatusChangeEvent;

export interface AnnotateEvent {
  kind: "annotate";
  id: string;
  message: string;
}

export interface StatusChangeEvent {
  kind: "status-change";
  id: string; // step id (e.g. "apply:Cluster.main")
  key: string; // resource key (e.g. "Cluster.main")
  status: ApplyStatus;
  message?: string;
}
