import { describe, it, expect } from "vitest"
import { tagClause } from "./clause-tagger"
import { CLAUSE_TYPES } from "./types"

describe("tagClause", () => {
  it("tags prohibitions", () => {
    expect(tagClause("The employee shall not compete for two years.")).toBe("Prohibition")
    expect(tagClause("The lessee must not alter the premises")).toBe("Prohibition")
    expect(tagClause("Smoking is PROHIBITED on the premises")).toBe("Prohibition")
  })

  it("tags obligations", () => {
    expect(tagClause("The employee shall indemnify the company")).toBe("Obligation")
    expect(tagClause("The supplier must deliver by Friday")).toBe("Obligation")
  })

  it("tags rights", () => {
    expect(tagClause("The company may terminate the agreement without notice")).toBe("Right")
    expect(tagClause("The tenant can sublet with consent")).toBe("Right")
  })

  it("falls back to Neutral", () => {
    expect(tagClause("A penalty of ₹1,00,000 applies for breach")).toBe("Neutral")
    expect(tagClause("")).toBe("Neutral")
  })

  it("gives Prohibition precedence over Right and Obligation", () => {
    expect(tagClause("The tenant shall not sublet but may assign")).toBe("Prohibition")
  })

  it("gives Obligation precedence over Right", () => {
    expect(tagClause("The buyer may inspect and shall pay on delivery")).toBe("Obligation")
  })

  it("matches keywords as substrings", () => {
    // "cannot" contains "can"
    expect(tagClause("The licensee cannot reverse engineer the software")).toBe("Right")
  })

  it("always returns one of the four labels", () => {
    for (const text of ["shall", "may", "nothing", "MUST NOT"]) {
      expect(CLAUSE_TYPES).toContain(tagClause(text))
    }
  })
})
