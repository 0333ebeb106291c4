import { CR, LF, RS } from "../constants";
import { MissingInitialRecordSeparatorError } from "../errors";
import { DelimiterFramer } from "./delimiterFramer";

export interface FramerOptions {
  maxFrameLength?: number;
}

/** Splits on LF only. A final unterminated line is still emitted. */
export function createLineFramer(options: FramerOptions = {}): DelimiterFramer {
  return new DelimiterFramer({
    name: "LineFramer",
    delimiters: [LF],
    collapseCRLF: false,
    skipEmptyFrames: false,
    emitTrailing: true,
    maxFrameLength: options.maxFrameLength ?? Infinity,
  });
}

/**
 * Splits on LF, CR and CRLF, each counting as exactly one line terminator, as
 * required by the event stream format.
 */
export function createServerSentEventLineFramer(options: FramerOptions = {}): DelimiterFramer {
  return new DelimiterFramer({
    name: "ServerSentEventLineFramer",
    delimiters: [LF, CR],
    collapseCRLF: true,
    skipEmptyFrames: false,
    emitTrailing: true,
    maxFrameLength: options.maxFrameLength ?? Infinity,
  });
}

/**
 * Splits a JSON Text Sequence (RFC 7464) into records. The stream must start with
 * RS; empty records between consecutive separators are skipped.
 */
export function createJSONSequenceFramer(options: FramerOptions = {}): DelimiterFramer {
  return new DelimiterFramer({
    name: "JSONSequenceFramer",
    delimiters: [RS],
    collapseCRLF: false,
    leadingByte: RS,
    missingLeadingByte: () => new MissingInitialRecordSeparatorError(),
    skipEmptyFrames: true,
    emitTrailing: true,
    maxFrameLength: options.maxFrameLength ?? Infinity,
  });
}
