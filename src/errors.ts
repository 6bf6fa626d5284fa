/** A captured body that should have been JSON but did not parse. Recovered locally. */
export class MalformedSampleError extends Error {
  entryIndex?: number;
  side?: "request" | "response";

  constructor(message: string, entryIndex?: number, side?: "request" | "response") {
    super(message);
    this.name = "MalformedSampleError";
    this.entryIndex = entryIndex;
    this.side = side;
  }
}

/** The capture document itself is not a usable HAR log. */
export class HarFormatError extends Error {
  /** JSON-ish path to the offending node, e.g. "log.entries[3].request.url" */
  location: string;

  constructor(message: string, location: string) {
    super(`${message} (at ${location})`);
    this.name = "HarFormatError";
    this.location = location;
  }
}

/** Bad command-line input. The CLI prints the message and exits 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** A replayed request could not be issued (DNS, refused, timeout, …). */
export class ReplayError extends Error {
  url: string;
  method: string;

  constructor(message: string, method: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReplayError";
    this.method = method;
    this.url = url;
  }
}
