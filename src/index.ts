// src/index.ts
export {
  parseLines,
  parseServerSentEventLines,
  parseJSONSequence,
  decodeJSONLines,
  decodeJSONSequence,
  decodeServerSentEvents,
  decodeServerSentEventsWithJSONData,
} from "./decoding";
export {
  serializeLines,
  encodeJSONLines,
  serializeJSONSequence,
  encodeJSONSequence,
  encodeServerSentEvents,
  encodeServerSentEventsWithJSONData,
} from "./encoding";
export {
  CancellationTransformer,
  JSONLinesEncoderTransformer,
  JSONLinesTransformer,
  JSONSequenceEncoderTransformer,
  JSONSequenceTransformer,
  LineTransformer,
  ServerSentEventsEncoderTransformer,
  ServerSentEventsTransformer,
  ServerSentEventsWithJSONDataEncoderTransformer,
  ServerSentEventsWithJSONDataTransformer,
  StateMachineTransformer,
} from "./transformers";
export { createJSONCodec, decodeEventData, encodeEventData } from "./codec";
export { collect, drive } from "./stream";
export { concatBytes } from "./lib/bytes";
export { untilDone } from "./predicates";
export {
  EventStreamError,
  FrameTooLargeError,
  InvalidStateError,
  MissingInitialRecordSeparatorError,
} from "./errors";
export { CR, LF, RS } from "./constants";

export { DelimiterFramer } from "./machines/delimiterFramer";
export {
  createJSONSequenceFramer,
  createLineFramer,
  createServerSentEventLineFramer,
} from "./machines/framers";
export { ServerSentEventAssembler } from "./machines/sseEventAssembler";
export {
  JSONSequenceSerializer,
  LineSerializer,
  ServerSentEventSerializer,
} from "./machines/serializers";

export type { FramingPolicy, FramerState } from "./machines/delimiterFramer";
export type { FramerOptions } from "./machines/framers";
export type { AssemblerState } from "./machines/sseEventAssembler";
export type { IngestAction, PollAction, StateMachine } from "./machines/types";
export type {
  ByteSource,
  ContinuePredicate,
  DecodeOptions,
  EventSource,
  JSONCodec,
  JSONCodecOptions,
  JSONDecodeOptions,
  JSONEncodeOptions,
  ServerSentEvent,
  ServerSentEventWithJSONData,
  ServerSentEventsDecodeOptions,
  ServerSentEventsJSONDecodeOptions,
} from "./types";
