import { decodeEventData, defaultJSONCodec, encodeEventData } from './codec';
import { ChainedMachine } from './machines/chain';
import {
  type FramerOptions,
  createJSONSequenceFramer,
  createLineFramer,
  createServerSentEventLineFramer,
} from './machines/framers';
import { MappingMachine } from './machines/mapping';
import {
  JSONSequenceSerializer,
  LineSerializer,
  ServerSentEventSerializer,
} from './machines/serializers';
import { ServerSentEventAssembler } from './machines/sseEventAssembler';
import type { StateMachine } from './machines/types';
import type {
  JSONCodec,
  JSONEncodeOptions,
  ServerSentEvent,
  ServerSentEventWithJSONData,
  ServerSentEventsJSONDecodeOptions,
} from './types';

interface JSONTransformerOptions extends FramerOptions {
  codec?: JSONCodec;
}

/**
 * Polls `machine` until it needs more input. Returns false once the machine has
 * ended, so the caller can stop the stream.
 */
function pump<In extends {}, Out>(
  machine: StateMachine<In, Out>,
  controller: TransformStreamDefaultController<Out>,
): boolean {
  while (true) {
    const action = machine.poll();
    switch (action.type) {
      case 'emit':
        controller.enqueue(action.value);
        break;
      case 'noop':
        break;
      case 'needsMore':
        return true;
      case 'error':
        throw action.error;
      case 'end':
        return false;
    }
  }
}

/**
 * Runs a state machine as a TransformStream. A fatal machine error errors the
 * stream; a machine that ends before its input does (an SSE stop predicate, for
 * example) terminates the readable side and cancels the writable side.
 */
export class StateMachineTransformer<In extends {}, Out> extends TransformStream<In, Out> {
  constructor(machine: StateMachine<In, Out>) {
    super({
      transform: (chunk, controller) => {
        const ingested = machine.ingest(chunk);
        if (ingested.type === 'emit') controller.enqueue(ingested.value);
        if (ingested.type === 'end' || !pump(machine, controller)) {
          controller.terminate();
        }
      },
      flush: (controller) => {
        const ingested = machine.ingest(null);
        if (ingested.type === 'emit') controller.enqueue(ingested.value);
        pump(machine, controller);
      },
    });
  }
}

/** Splits a byte stream into lines on LF. */
export class LineTransformer extends StateMachineTransformer<Uint8Array, Uint8Array> {
  constructor(options: FramerOptions = {}) {
    super(createLineFramer(options));
  }
}

/** Decodes a JSON Lines byte stream into values. */
export class JSONLinesTransformer<T = unknown> extends StateMachineTransformer<Uint8Array, T> {
  constructor(options: JSONTransformerOptions = {}) {
    const codec = options.codec ?? defaultJSONCodec;
    super(
      new ChainedMachine(
        createLineFramer(options),
        new MappingMachine('JSONLinesDecoder', (line: Uint8Array) => codec.decode<T>(line)),
      ),
    );
  }
}

/** Decodes a JSON Text Sequence byte stream into values. */
export class JSONSequenceTransformer<T = unknown> extends StateMachineTransformer<Uint8Array, T> {
  constructor(options: JSONTransformerOptions = {}) {
    const codec = options.codec ?? defaultJSONCodec;
    super(
      new ChainedMachine(
        createJSONSequenceFramer(options),
        new MappingMachine('JSONSequenceDecoder', (record: Uint8Array) => codec.decode<T>(record)),
      ),
    );
  }
}

/** Decodes a `text/event-stream` byte stream into events. */
export class ServerSentEventsTransformer extends StateMachineTransformer<Uint8Array, ServerSentEvent> {
  constructor(options: Omit<ServerSentEventsJSONDecodeOptions, 'codec' | 'signal'> = {}) {
    super(
      new ChainedMachine(
        createServerSentEventLineFramer(options),
        new ServerSentEventAssembler(options.continueWhile),
      ),
    );
  }
}

/** Decodes a `text/event-stream` byte stream into events whose data is JSON. */
export class ServerSentEventsWithJSONDataTransformer<T = unknown>
  extends StateMachineTransformer<Uint8Array, ServerSentEventWithJSONData<T>> {
  constructor(options: Omit<ServerSentEventsJSONDecodeOptions, 'signal'> = {}) {
    const codec = options.codec ?? defaultJSONCodec;
    super(
      new ChainedMachine(
        new ChainedMachine(
          createServerSentEventLineFramer(options),
          new ServerSentEventAssembler(options.continueWhile),
        ),
        new MappingMachine(
          'ServerSentEventJSONDecoder',
          (event: ServerSentEvent) => decodeEventData<T>(event, codec),
        ),
      ),
    );
  }
}

/**
 * Encodes each value with the codec before it reaches the serializer, so a JSON
 * `null` is written like any other value.
 */
function serializeEncoded<T>(
  serializer: StateMachine<Uint8Array, Uint8Array>,
  codec: JSONCodec,
): Transformer<T, Uint8Array> {
  return {
    transform: (value, controller) => {
      const action = serializer.ingest(codec.encode(value));
      if (action.type === 'emit') controller.enqueue(action.value);
    },
  };
}

/** Writes each value as one JSON line. */
export class JSONLinesEncoderTransformer<T = unknown> extends TransformStream<T, Uint8Array> {
  constructor(options: JSONEncodeOptions = {}) {
    super(serializeEncoded<T>(new LineSerializer(), options.codec ?? defaultJSONCodec));
  }
}

/** Writes each value as one JSON Text Sequence record. */
export class JSONSequenceEncoderTransformer<T = unknown> extends TransformStream<T, Uint8Array> {
  constructor(options: JSONEncodeOptions = {}) {
    super(serializeEncoded<T>(new JSONSequenceSerializer(), options.codec ?? defaultJSONCodec));
  }
}

/** Writes events in the `text/event-stream` format. */
export class ServerSentEventsEncoderTransformer
  extends StateMachineTransformer<ServerSentEvent, Uint8Array> {
  constructor() {
    super(new ServerSentEventSerializer());
  }
}

/** Writes events whose data is a JSON value in the `text/event-stream` format. */
export class ServerSentEventsWithJSONDataEncoderTransformer<T = unknown>
  extends StateMachineTransformer<ServerSentEventWithJSONData<T>, Uint8Array> {
  constructor(options: JSONEncodeOptions = {}) {
    const codec = options.codec ?? defaultJSONCodec;
    super(
      new ChainedMachine(
        new MappingMachine(
          'ServerSentEventJSONEncoder',
          (event: ServerSentEventWithJSONData<T>) => encodeEventData(event, codec),
        ),
        new ServerSentEventSerializer(),
      ),
    );
  }
}

/** A TransformStream that errors if the provided signal is aborted. */
export class CancellationTransformer<T> extends TransformStream<T, T> {
  constructor(signal?: AbortSignal) {
    const abortError = () => signal?.reason ?? new DOMException('Operation aborted', 'AbortError');
    let abortHandler: (() => void) | undefined;
    super({
      start: (controller) => {
        if (!signal) return;
        if (signal.aborted) {
          controller.error(abortError());
          return;
        }
        abortHandler = () => controller.error(abortError());
        signal.addEventListener('abort', abortHandler, { once: true });
      },
      flush: () => {
        if (abortHandler) signal?.removeEventListener('abort', abortHandler);
      },
    });
  }
}
