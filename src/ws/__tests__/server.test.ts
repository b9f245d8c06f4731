import { describe, it, expect } from "vitest";
import { frameText } from "../server.js";

describe("frameText", () => {
  const frame = '{"type":"ping"}';

  it("decodes a single buffer", () => {
    expect(frameText(Buffer.from(frame))).toBe(frame);
  });

  it("joins fragmented buffers", () => {
    expect(frameText([Buffer.from('{"type":'), Buffer.from('"ping"}')])).toBe(frame);
  });

  it("decodes an ArrayBuffer", () => {
    const bytes = new TextEncoder().encode(frame);
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    expect(frameText(copy)).toBe(frame);
  });
});
