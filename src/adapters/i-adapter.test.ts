import { describe, it, expectTypeOf } from "vitest";
import type { IAdapter } from "./i-adapter.js";
import type { CallOptions, ContentResponse, MessageContent } from "../types/index.js";

type RawAdapter = IAdapter<{ raw: true }, { reply: string }>;

describe("IAdapter interface contract", () => {
  it("transformRequest accepts model id, turns and options and returns the native request", () => {
    expectTypeOf<RawAdapter["transformRequest"]>().toBeFunction();
    expectTypeOf<RawAdapter["transformRequest"]>().parameter(0).toBeString();
    expectTypeOf<RawAdapter["transformRequest"]>().parameter(1).toEqualTypeOf<MessageContent[]>();
    expectTypeOf<RawAdapter["transformRequest"]>().parameter(2).toEqualTypeOf<CallOptions>();
    expectTypeOf<RawAdapter["transformRequest"]>().returns.toEqualTypeOf<{ raw: true }>();
  });

  it("execute accepts the native request and resolves the native response", () => {
    expectTypeOf<RawAdapter["execute"]>().parameter(0).toEqualTypeOf<{ raw: true }>();
    expectTypeOf<RawAdapter["execute"]>().returns.toEqualTypeOf<Promise<{ reply: string }>>();
  });

  it("transformResponse returns ContentResponse", () => {
    expectTypeOf<RawAdapter["transformResponse"]>().parameter(0).toEqualTypeOf<{ reply: string }>();
    expectTypeOf<RawAdapter["transformResponse"]>().returns.toEqualTypeOf<ContentResponse>();
  });

  it("defaults to unknown native shapes", () => {
    expectTypeOf<IAdapter["execute"]>().returns.toEqualTypeOf<Promise<unknown>>();
  });
});
