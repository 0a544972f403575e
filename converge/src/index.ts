export * as App from "./App.ts";
export * as Apply from "./Apply.ts";
export * as Config from "./Config.ts";
export * from "./Converge.ts";
export * as Diff from "./Diff.ts";
export * as Document from "./Document.ts";
export * from "./Errors.ts";
export type * from "./Event.ts";
export * as Graph from "./Graph.ts";
export * as Plan from "./Plan.ts";
export * as Provider from "./Provider.ts";
export * as Reference from "./Reference.ts";
export * as Report from "./Report.ts";
export * from "./Reporter.ts";
export * from "./Resource.ts";
export * from "./State/InMemoryState.ts";
export * from "./State/LocalState.ts";
export type * from "./State/ResourceState.ts";
export * from "./State/State.ts";
export * from "./Unknown.ts";
