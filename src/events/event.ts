/**
 * Scoped Event Records
 *
 * CloudEvents-style event records carrying a delivery scope:
 * - EventScope.PROCESS: delivered through the local (process) broker only
 * - EventScope.APP: delivered through the distributed (application) broker
 *
 * Events cross a broker as flat records (`toFlatRecord()` / `fromFlatRecord()`).
 * Typed events are declared with `defineEvent()`, whose zod data schema is the
 * decode step applied to every record a typed handler receives.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { EventValidationError } from '../broker/errors.js';

/**
 * Event delivery scope
 */
export enum EventScope {
  PROCESS = 'process',
  APP = 'app',
}

/**
 * One-level key/value record handed to brokers
 */
export type FlatRecord = Record<string, unknown>;

/** CloudEvents version stamped on new events */
export const SPEC_VERSION = '1.0';

/** Prefix of the channel an event type is delivered on */
export const EVENT_CHANNEL_PREFIX = 'events.';

export function channelForEventType(eventType: string): string {
  return `${EVENT_CHANNEL_PREFIX}${eventType}`;
}

/**
 * What the event bus needs from an event
 */
export interface RoutableEvent {
  readonly type: string;
  readonly scope: EventScope;
  channelName(): string;
  toFlatRecord(): FlatRecord;
}

/**
 * Zod schema for the standard event attributes (presence checks only)
 */
export const EventRecordSchema = z.object({
  id: z.string().min(1, 'id cannot be empty'),
  source: z.string().min(1, 'source cannot be empty'),
  specversion: z.string().min(1, 'specversion cannot be empty'),
  type: z.string().min(1, 'type cannot be empty'),
  datacontenttype: z.string().optional(),
  dataschema: z.string().optional(),
  subject: z.string().optional(),
  time: z.coerce.date().optional(),
  data: z.unknown().optional(),
  scope: z.nativeEnum(EventScope).optional(),
});

const STANDARD_FIELDS: ReadonlySet<string> = new Set(Object.keys(EventRecordSchema.shape));

export interface EventInit<TData = unknown> {
  source: string;
  type: string;
  id?: string;
  specversion?: string;
  datacontenttype?: string;
  dataschema?: string;
  subject?: string;
  time?: Date;
  data?: TData;
  /** Extension attributes, flattened to the top level on serialization */
  extensions?: Record<string, unknown>;
  /** Defaults to EventScope.APP */
  scope?: EventScope;
}

/**
 * Event record with a delivery scope
 */
export class ScopedEvent<TData = unknown> implements RoutableEvent {
  readonly id: string;
  readonly source: string;
  readonly specversion: string;
  readonly type: string;
  readonly datacontenttype?: string;
  readonly dataschema?: string;
  readonly subject?: string;
  readonly time: Date;
  readonly data?: TData;
  readonly extensions: Record<string, unknown>;
  readonly scope: EventScope;

  constructor(init: EventInit<TData>) {
    this.id = init.id ?? uuidv4();
    this.source = init.source;
    this.specversion = init.specversion ?? SPEC_VERSION;
    this.type = init.type;
    this.datacontenttype = init.datacontenttype ?? 'application/json';
    this.dataschema = init.dataschema;
    this.subject = init.subject;
    this.time = init.time ?? new Date();
    this.data = init.data;
    this.extensions = { ...(init.extensions ?? {}) };
    this.scope = init.scope ?? EventScope.APP;

    const result = EventRecordSchema.safeParse(this.toFlatRecord());
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new EventValidationError(`Invalid event: ${issues.join(', ')}`, issues);
    }
  }

  /**
   * Rebuild an event from a flat record; unknown keys become extensions
   *
   * @throws EventValidationError if a required attribute is missing
   */
  static fromFlatRecord(record: FlatRecord): ScopedEvent {
    const standard: FlatRecord = {};
    const extensions: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(record)) {
      if (STANDARD_FIELDS.has(key)) {
        standard[key] = value;
      } else {
        extensions[key] = value;
      }
    }

    const result = EventRecordSchema.safeParse(standard);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new EventValidationError(`Invalid event record: ${issues.join(', ')}`, issues);
    }

    return new ScopedEvent({ ...result.data, extensions });
  }

  get eventId(): string {
    return this.id;
  }

  get eventType(): string {
    return this.type;
  }

  channelName(): string {
    return channelForEventType(this.type);
  }

  /**
   * Flatten to one level: defined standard attributes, then extensions
   */
  toFlatRecord(): FlatRecord {
    const record: FlatRecord = {
      id: this.id,
      source: this.source,
      specversion: this.specversion,
      type: this.type,
    };

    if (this.datacontenttype !== undefined) record.datacontenttype = this.datacontenttype;
    if (this.dataschema !== undefined) record.dataschema = this.dataschema;
    if (this.subject !== undefined) record.subject = this.subject;
    record.time = this.time.toISOString();
    if (this.data !== undefined) record.data = this.data;
    record.scope = this.scope;

    return { ...record, ...this.extensions };
  }

  toJSON(): FlatRecord {
    return this.toFlatRecord();
  }

  /**
   * Constructor arguments that reproduce this event
   */
  toInit(): EventInit<TData> {
    return {
      id: this.id,
      source: this.source,
      specversion: this.specversion,
      type: this.type,
      datacontenttype: this.datacontenttype,
      dataschema: this.dataschema,
      subject: this.subject,
      time: this.time,
      data: this.data,
      extensions: { ...this.extensions },
      scope: this.scope,
    };
  }
}

// ============================================================================
// Typed event definitions
// ============================================================================

export type DataSchema<TData> = z.ZodType<TData, z.ZodTypeDef, unknown>;

export interface EventDefinitionOptions<TData> {
  type: string;
  data: DataSchema<TData>;
  /** Scope of events created from this definition (default: app) */
  scope?: EventScope;
  /** Source stamped when create() is given none */
  source?: string;
}

export type TypedEventInit<TData> = Omit<EventInit<TData>, 'type' | 'source' | 'data'> & {
  data: TData;
  source?: string;
};

export interface EventDefinition<TData> {
  readonly type: string;
  readonly scope: EventScope;
  readonly channel: string;
  create(init: TypedEventInit<TData>): ScopedEvent<TData>;
  /**
   * Flat record -> typed event
   *
   * @throws EventValidationError on a type mismatch or invalid data
   */
  decode(record: FlatRecord): ScopedEvent<TData>;
}

/**
 * Declare a typed event
 *
 * @example
 * ```typescript
 * const OrderCreated = defineEvent({
 *   type: 'order.created',
 *   data: z.object({ orderId: z.string(), amount: z.number() }),
 * });
 * bus.on(OrderCreated, (event) => console.log(event.data?.orderId));
 * ```
 */
export function defineEvent<TData>(options: EventDefinitionOptions<TData>): EventDefinition<TData> {
  if (!options.type) {
    throw new EventValidationError('Event definition must have a type', ['type: cannot be empty']);
  }

  const { type, data: schema } = options;
  const scope = options.scope ?? EventScope.APP;

  const parseData = (value: unknown): TData => {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issues = formatIssues(result.error, 'data');
      throw new EventValidationError(`Invalid data for event '${type}': ${issues.join(', ')}`, issues);
    }
    return result.data;
  };

  return {
    type,
    scope,
    channel: channelForEventType(type),

    create(init: TypedEventInit<TData>): ScopedEvent<TData> {
      const source = init.source ?? options.source;
      if (source === undefined) {
        throw new EventValidationError(`Event '${type}' needs a source`, ['source: Required']);
      }
      return new ScopedEvent<TData>({
        ...init,
        type,
        source,
        data: parseData(init.data),
        scope: init.scope ?? scope,
      });
    },

    decode(record: FlatRecord): ScopedEvent<TData> {
      const base = ScopedEvent.fromFlatRecord(record);
      if (base.type !== type) {
        throw new EventValidationError(
          `Expected event type '${type}', got '${base.type}'`,
          [`type: expected ${type}`]
        );
      }
      return new ScopedEvent<TData>({ ...base.toInit(), data: parseData(base.data) });
    },
  };
}

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const issuePath = [prefix, ...issue.path].filter(part => part !== undefined).join('.');
    return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
  });
}
