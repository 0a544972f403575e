import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import type { ApplyEvent } from "./Event.ts";
import { format, type Plan } from "./Plan.ts";

export interface ReporterService {
  displayPlan: (plan: Plan) => Effect.Effect<void>;
  emit: (event: ApplyEvent) => Effect.Effect<void>;
}

export class Reporter extends Context.Tag("Reporter")<
  Reporter,
  ReporterService
>() {}

/**
 * Writes plan summaries and status changes to the Effect logger.
 */
export const logReporter = Layer.succeed(
  Reporter,
  Reporter.of({
    displayPlan: (plan) => Effect.logInfo(format(plan)),
    emit: (event) =>
      event.kind === "status-change"
        ? Effect.logInfo(
            event.message
              ? `${event.status} ${event.id}: ${event.message}`
              : `${event.status} ${event.id}`,
          )
        : Effect.logInfo(`${event.id}: ${event.message}`),
  }),
);
