import { isNonEmptyString } from "../is-non-empty-string"

describe("isNonEmptyString", () => {
  it.each([
    ["abc", true],
    [" a ", true],
    ["", false],
    ["   ", false],
    [undefined, false],
    [null, false],
    [42, false],
  ])("%o -> %s", (value, expected) => {
    expect(isNonEmptyString(value)).toBe(expected)
  })
})
