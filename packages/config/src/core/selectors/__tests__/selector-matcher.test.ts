import type { Selector } from "../../../ports/layer"
import { EMPTY_MAPPING } from "../../tree/config-tree"
import { matchSelectors } from "../selector-matcher"

const selector = (pattern: string, declaredBy: Selector["declaredBy"] = "defaults"): Selector => ({
  pattern,
  overrides: EMPTY_MAPPING,
  declaredBy,
})

describe("matchSelectors", () => {
  const selectors = [
    selector("fastqc"),
    selector("chewbbaca", "profile:incd"),
    selector("fastqc", "fragment:main.config"),
  ]

  it("keeps every selector naming the process, in order", () => {
    expect(matchSelectors("fastqc", selectors).map((s) => s.declaredBy)).toEqual([
      "defaults",
      "fragment:main.config",
    ])
  })

  it("matches exactly", () => {
    expect(matchSelectors("fastqc_report", selectors)).toEqual([])
    expect(matchSelectors("FastQC", selectors)).toEqual([])
    expect(matchSelectors("chew", selectors)).toEqual([])
  })

  it("matches nothing without selectors", () => {
    expect(matchSelectors("fastqc", [])).toEqual([])
  })
})
