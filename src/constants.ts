// Wire-mandated byte values.
export const LF = 0x0a; // '\n'
export const CR = 0x0d; // '\r'
export const RS = 0x1e; // record separator, RFC 7464
export const COLON = 0x3a; // ':'
export const SPACE = 0x20; // ' '

export const INITIAL_BUFFER_SIZE = 8192; // 8KB, grows on demand
export const DONE_SENTINEL = "[DONE]";

// A leading U+FEFF is part of the decoded text, not a byte order mark to drop.
export const decoder = new TextDecoder("utf-8", { ignoreBOM: true });
export const encoder = new TextEncoder();
