import { describe, expect, it } from "vitest";
import { InvalidYieldError } from "../errors.js";
import {
  classifyYield,
  describeResumeValue,
  fireAndForget,
  keepWaiting,
  SENT,
  sendUntil,
  TIMEOUT,
  type Yielded,
} from "./yields.js";

describe("classifyYield", () => {
  it("treats a non-empty string as a plain send", () => {
    expect(classifyYield("ls\n")).toEqual({ kind: "send", text: "ls\n" });
  });

  it("passes the tagged shapes through unchanged", () => {
    const wait = keepWaiting();
    const ff = fireAndForget("\x03");
    const accept = () => true;
    const until = sendUntil("make\n", accept);

    expect(classifyYield(wait)).toBe(wait);
    expect(classifyYield(ff)).toBe(ff);
    expect(classifyYield(until)).toBe(until);
  });

  it("rejects empty text in every shape", () => {
    expect(() => classifyYield("")).toThrow(InvalidYieldError);
    expect(() => classifyYield(fireAndForget(""))).toThrow(InvalidYieldError);
    expect(() => classifyYield(sendUntil("", () => true))).toThrow(InvalidYieldError);
  });

  it("rejects values outside the protocol", () => {
    const bogus: Yielded = JSON.parse('{"kind":"bogus","text":"x"}');
    expect(() => classifyYield(bogus)).toThrow('Invalid yielded value: {"kind":"bogus","text":"x"}');

    const untilWithoutPredicate: Yielded = JSON.parse('{"kind":"until","text":"x"}');
    expect(() => classifyYield(untilWithoutPredicate)).toThrow(InvalidYieldError);

    const nothing: Yielded = JSON.parse("null");
    expect(() => classifyYield(nothing)).toThrow("Invalid yielded value: null");
  });
});

describe("describeResumeValue", () => {
  it("names sentinels and summarizes output", () => {
    expect(describeResumeValue(TIMEOUT)).toBe("timeout");
    expect(describeResumeValue(SENT)).toBe("sent");
    expect(describeResumeValue(undefined)).toBe("none");
    expect(describeResumeValue("hello")).toBe("output(5)");
  });
});
