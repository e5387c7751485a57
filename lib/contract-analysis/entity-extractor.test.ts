import { describe, it, expect } from "vitest"
import { extractEntities } from "./entity-extractor"
import { EMPLOYMENT_SNIPPET, LEASE_AGREEMENT } from "@/lib/sample-contracts"

describe("extractEntities", () => {
  it("finds the rupee amount in the employment snippet", () => {
    expect(extractEntities(EMPLOYMENT_SNIPPET.rawText)).toEqual({
      amounts: ["₹1,00,000"],
      dates: [],
      jurisdiction: [],
    })
  })

  it("extracts amounts with symbol, decimals and unit words", () => {
    const text = "Rent of ₹ 25,000.50 per month, deposit 2 lakhs and a cap of 1.5 Crore."
    expect(extractEntities(text).amounts).toEqual(["₹ 25,000.50", "2 lakhs", "1.5 crore"])
  })

  it("ignores bare numbers without a symbol or unit", () => {
    expect(extractEntities("Clause 12 applies for 30 days").amounts).toEqual([])
  })

  it("extracts D/M/YYYY dates without validating them", () => {
    const text = "Signed on 5/1/2024 and renewed 15/11/2025; invalid 99/99/9999 too."
    expect(extractEntities(text).dates).toEqual(["5/1/2024", "15/11/2025", "99/99/9999"])
  })

  it("ignores two-digit years", () => {
    expect(extractEntities("Dated 1/1/24").dates).toEqual([])
  })

  it("keeps duplicate jurisdictions in document order", () => {
    const text = "Courts of Mumbai and New Delhi, India have jurisdiction. Mumbai again."
    expect(extractEntities(text).jurisdiction).toEqual(["mumbai", "delhi", "india", "mumbai"])
  })

  it("matches multi-word place names case-insensitively", () => {
    expect(extractEntities("Governed by the laws of TAMIL NADU").jurisdiction).toEqual(["tamil nadu"])
  })

  it("matches place names inside longer words", () => {
    expect(extractEntities("Indiana law applies").jurisdiction).toEqual(["india"])
  })

  it("recognises Devanagari digits in amounts and dates", () => {
    expect(extractEntities("दिनांक १५/०८/२०२४ को ₹१,००,००० का जुर्माना")).toEqual({
      amounts: ["₹१,००,०००"],
      dates: ["१५/०८/२०२४"],
      jurisdiction: [],
    })
    expect(extractEntities("राशि ₹१०००").amounts).toEqual(["₹१०००"])
  })

  it("extracts every entity kind from the lease sample", () => {
    expect(extractEntities(LEASE_AGREEMENT.rawText)).toEqual({
      amounts: ["₹45,000", "2 lakhs", "₹500"],
      dates: ["01/04/2025"],
      jurisdiction: ["tamil nadu", "india"],
    })
  })
})
