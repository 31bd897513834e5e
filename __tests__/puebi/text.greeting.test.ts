import { describe, expect, it } from "vitest";

import { capitalizeGreetingName } from "../../src/puebi/text/greeting.ts";

describe("capitalizeGreetingName", () => {
  it("capitalizes the name after Hai and reports its span", () => {
    expect(capitalizeGreetingName("Hai luqmanul hakim,")).toEqual({
      text: "Hai Luqmanul Hakim,",
      nameSpans: [{ start: 4, end: 18 }],
    });
  });

  it("rewrites at most the configured number of tokens", () => {
    expect(capitalizeGreetingName("Hai a b c d e f")).toEqual({
      text: "Hai A B C D e f",
      nameSpans: [],
    });
    expect(capitalizeGreetingName("Hai ani budi", 1).text).toBe("Hai Ani budi");
  });

  it("leaves tokens with digits or symbols untouched", () => {
    expect(capitalizeGreetingName("Hai budi123 ani!")).toEqual({
      text: "Hai budi123 Ani!",
      nameSpans: [{ start: 4, end: 15 }],
    });
  });

  it("title-cases names with apostrophes and hyphens", () => {
    expect(capitalizeGreetingName("Hai o'neil-smith").text).toBe("Hai O'neil-smith");
    expect(capitalizeGreetingName("Hai bUDI").text).toBe("Hai Budi");
  });

  it("stops at punctuation", () => {
    expect(capitalizeGreetingName("Hai budi, apa kabar").text).toBe("Hai Budi, apa kabar");
  });

  it("reports no span when the run is not closed by , ! or ?", () => {
    expect(capitalizeGreetingName("Hai budi terima kasih")).toEqual({
      text: "Hai Budi Terima Kasih",
      nameSpans: [],
    });
    expect(capitalizeGreetingName("Hai budi pergi ke bank.").nameSpans).toEqual([]);
    expect(capitalizeGreetingName("Hai ani budi,", 1).nameSpans).toEqual([]);
  });

  it("needs the exact greeting word", () => {
    expect(capitalizeGreetingName("Halo budi")).toEqual({ text: "Halo budi", nameSpans: [] });
    expect(capitalizeGreetingName("hai budi")).toEqual({ text: "hai budi", nameSpans: [] });
  });

  it("reports spans in code points for every greeting", () => {
    expect(capitalizeGreetingName("😀 Hai ani,")).toEqual({
      text: "😀 Hai Ani,",
      nameSpans: [{ start: 6, end: 9 }],
    });
    expect(capitalizeGreetingName("Hai ani! Hai budi?")).toEqual({
      text: "Hai Ani! Hai Budi?",
      nameSpans: [
        { start: 4, end: 7 },
        { start: 13, end: 17 },
      ],
    });
  });
});
