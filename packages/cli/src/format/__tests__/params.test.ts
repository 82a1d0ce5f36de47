import { isAppError } from "@modeldeck/errors"
import { parseParamPairs } from "../params"

describe("parseParamPairs", () => {
  it("returns an empty mapping for no pairs", () => {
    expect(parseParamPairs([])).toEqual({})
  })

  it("reads values as YAML scalars", () => {
    expect(
      parseParamPairs(["temperature=0.7", "max_tokens=256", "stream=false", "stop=END"]),
    ).toEqual({ temperature: 0.7, max_tokens: 256, stream: false, stop: "END" })
  })

  it("splits on the first equals sign only", () => {
    expect(parseParamPairs(["expr=a=b"])).toEqual({ expr: "a=b" })
  })

  it("keeps empty, null-like and unparseable values as strings", () => {
    expect(parseParamPairs(["a=", "b=null", "c=[unclosed"])).toEqual({
      a: "",
      b: "null",
      c: "[unclosed",
    })
  })

  it("lets a later pair override an earlier one", () => {
    expect(parseParamPairs(["n=1", "n=2"])).toEqual({ n: 2 })
  })

  it.each(["novalue", "=1", " =1"])("rejects %j", (pair) => {
    let caught: unknown

    try {
      parseParamPairs([pair])
    } catch (err) {
      caught = err
    }

    expect(isAppError(caught)).toBe(true)
    expect(caught).toMatchObject({ code: "invalid_argument" })
  })
})
