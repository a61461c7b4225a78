import { describe, expect, it } from "vitest";
import { formatAccessLine, formatLogTimestamp } from "./accessLog";

describe("formatLogTimestamp", () => {
  it("formats in UTC with zero padding", () => {
    expect(formatLogTimestamp(new Date(Date.UTC(2026, 0, 5, 7, 3, 9)))).toBe(
      "05/Jan/2026:07:03:09 +0000",
    );
  });
});

describe("formatAccessLine", () => {
  it("renders a common log format line", () => {
    const line = formatAccessLine({
      remoteAddr: "127.0.0.1",
      time: new Date(Date.UTC(2026, 9, 19, 14, 30, 0)),
      method: "POST",
      url: "/products/cah/feedback?x=1",
      httpVersion: "1.1",
      status: 200,
      size: 142,
    });
    expect(line).toBe(
      '127.0.0.1 - - [19/Oct/2026:14:30:00 +0000] "POST /products/cah/feedback?x=1 HTTP/1.1" 200 142',
    );
  });
});
