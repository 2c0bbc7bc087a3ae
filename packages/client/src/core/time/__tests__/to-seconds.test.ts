import { ExpirationNotValidError } from "../../../errors/errors"
import { days, seconds } from "../../../tests/utils/client-test-helpers"
import { MAX_RELATIVE_TTL_SECONDS, toSeconds } from "../to-seconds"

describe("toSeconds", () => {
  it("maps 0 to 0", () => {
    expect(toSeconds(0)).toBe(0)
  })

  it("converts whole seconds", () => {
    expect(toSeconds(seconds(4))).toBe(4)
    expect(toSeconds(seconds(1))).toBe(1)
  })

  it("stays relative just under 30 days", () => {
    expect(toSeconds(days(30) - seconds(1))).toBe(2591999)
  })

  it("does not adjust values above 30 days", () => {
    expect(MAX_RELATIVE_TTL_SECONDS).toBe(2592000)
    expect(toSeconds(days(31))).toBe(2678400)
  })

  it("rejects fractions of a second", () => {
    expect(() => toSeconds(250)).toThrow(ExpirationNotValidError)
    expect(() => toSeconds(250)).toThrow("Expiration must be whole seconds, got 250ms")
    expect(() => toSeconds(1500)).toThrow(ExpirationNotValidError)
  })

  it.each([-1000, 1000.5, Number.NaN, Number.POSITIVE_INFINITY])("rejects %s", (duration) => {
    expect(() => toSeconds(duration)).toThrow(ExpirationNotValidError)
  })
})
