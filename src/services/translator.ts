import type { AlertEvent, WireEvent } from "../types/alert.js";
import { SerializationError } from "../errors.js";

function describeType(value: unknown): string {
  return value === null ? "null" : typeof value;
}

/**
 * Map an alert event onto AlertManager's label/annotation model.
 *
 * Fixed labels come first, then tags are overlaid; a tag named like a fixed
 * label (e.g. `_level`) replaces it. Fields become annotations and must all be
 * strings: any other value throws SerializationError rather than being coerced.
 *
 * Both maps have no prototype, so any key (`__proto__` included) is kept as
 * an own entry. Events parsed by `alertEventSchema` have already lost a
 * `__proto__` tag or field at that point.
 */
export function translateEvent(event: AlertEvent): WireEvent {
  const labels: Record<string, string> = Object.create(null);
  labels._topic = event.topic;
  labels._ID = event.state.id;
  labels._message = event.state.message;
  labels._level = event.state.level;
  labels._name = event.data.name;
  labels._taskName = event.data.taskName;
  labels._category = event.data.category;
  labels._recoverable = String(event.data.recoverable);
  for (const [key, value] of Object.entries(event.data.tags)) {
    labels[key] = value;
  }

  const annotations: Record<string, string> = Object.create(null);
  for (const [key, value] of Object.entries(event.data.fields)) {
    if (typeof value !== "string") {
      throw new SerializationError(`field "${key}" must be a string to be sent as an annotation, got ${describeType(value)}`);
    }
    annotations[key] = value;
  }

  return { labels, annotations };
}

/** Request body for one event: a JSON array holding the single wire event. */
export function buildPayload(event: AlertEvent): string {
  const wire = translateEvent(event);
  try {
    return JSON.stringify([wire]);
  } catch (err) {
    throw new SerializationError("cannot encode AlertManager payload", { cause: err });
  }
}
