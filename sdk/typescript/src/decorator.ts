/**
 * Decorators add to or rewrite event data before sampling and delivery.
 */

import { MAX_VALUE_BYTES, cleanAttributes, trimLongStrings } from "./attributes.js";
import type { EventData, HoneycombEvent } from "./event.js";

export interface Decorator {
  decorate(data: EventData): EventData;
}

export type DecoratorFactory = (options: Record<string, unknown>) => Decorator;

export interface DecoratorSpec {
  type: string;
  options?: Record<string, unknown>;
}

/**
 * Adds fixed fields to every event. Existing fields win.
 */
export class StaticFieldsDecorator implements Decorator {
  constructor(private readonly fields: EventData) {}

  decorate(data: EventData): EventData {
    return { ...this.fields, ...data };
  }
}

export class DecoratorRegistry {
  private readonly factories = new Map<string, DecoratorFactory>();

  register(type: string, factory: DecoratorFactory): this {
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  create(spec: DecoratorSpec): Decorator {
    const factory = this.factories.get(spec.type);
    if (!factory) {
      throw new Error(`unknown decorator type: ${spec.type}`);
    }
    return factory(spec.options ?? {});
  }
}

export const defaultDecoratorRegistry = new DecoratorRegistry().register(
  "static",
  (options) => new StaticFieldsDecorator(Object.fromEntries(cleanAttributes(options.fields)))
);

export interface DecorateOptions {
  /** @default 49_127 */
  maxValueBytes?: number;
  /** Key already popped into the event's sample rate; dropped if the decorator adds it back. */
  samplerateKey?: string | null;
}

/**
 * Decorate an event's data. The decorator's output is cleaned and trimmed
 * again so it stays flat and within the value limit.
 */
export function decorateEvent(
  event: HoneycombEvent,
  decorator: Decorator,
  options: DecorateOptions = {}
): HoneycombEvent {
  const { maxValueBytes = MAX_VALUE_BYTES, samplerateKey } = options;
  const cleaned = cleanAttributes(decorator.decorate({ ...event.data })).filter(([key]) => key !== samplerateKey);
  return { ...event, data: Object.fromEntries(trimLongStrings(cleaned, maxValueBytes)) };
}
