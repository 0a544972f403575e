import * as Context from "effect/Context";
import * as Layer from "effect/Layer";

export interface AppProps {
  name: string;
  stage: string;
}

/**
 * The application and stage a run converges. Recorded state is scoped to it.
 */
export class App extends Context.Tag("App")<App, AppProps>() {}

export const app = (input: AppProps) => Layer.succeed(App, App.of(input));
