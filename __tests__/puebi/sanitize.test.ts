import { afterEach, describe, expect, it, vi } from "vitest";

import { sanitize } from "../../src/puebi/index.ts";

const TRANSFER_NOTICE =
  "Hai Luqman, Anda telah melakukan Transfer Real Time dari rekening 1234567890 sejumlah Rp 12.000. " +
  "Pastikan transaksi ini benar dilakukan atau Hubungi Call Center 1500 035.";

const TRANSFER_NOTICE_SANITIZED =
  "Hai Luqman, anda telah melakukan transfer real time dari rekening 1234567890 sejumlah Rp12.000. " +
  "Pastikan transaksi ini benar dilakukan atau hubungi Call Center 1500 035.";

describe("sanitize", () => {
  afterEach(() => {
    delete process.env.DEBUG_PUEBI;
  });

  it("returns blank input unchanged", () => {
    expect(sanitize("")).toBe("");
    expect(sanitize("   ")).toBe("   ");
  });

  it("capitalizes the name after a greeting", () => {
    expect(sanitize("Hai luqmanul hakim,")).toBe("Hai Luqmanul Hakim,");
  });

  it("lowers ordinary words after a greeting name that has no closing comma", () => {
    expect(sanitize("Hai budi terima kasih")).toBe("Hai Budi terima kasih");
    expect(sanitize("Hai budi pergi ke bank.")).toBe("Hai Budi pergi ke bank.");
  });

  it("lets the engine lower the rest of the name when greeting protection is off", () => {
    expect(sanitize("Hai luqmanul hakim,", { protectGreetingName: false })).toBe("Hai Luqmanul hakim,");
  });

  it("normalizes a transfer notice", () => {
    expect(sanitize(TRANSFER_NOTICE)).toBe(TRANSFER_NOTICE_SANITIZED);
  });

  it("keeps exception words mid-sentence", () => {
    expect(sanitize("Hubungi Call Center 1500 035.")).toBe("Hubungi Call Center 1500 035.");
  });

  it("splits glued prepositions and capitalizes the sentence", () => {
    expect(sanitize("dirumah saya")).toBe("Di rumah saya");
  });

  it("spaces every dot in a run of glued sentences", () => {
    expect(sanitize("a.b.c")).toBe("A. B. C");
  });

  it("runs the whole pipeline and trims", () => {
    expect(sanitize("  saya tinggal di Jalan Sudirman  ,kota Jakarta .terima kasih  ")).toBe(
      "Saya tinggal di jalan Sudirman, kota Jakarta. Terima kasih",
    );
  });

  it("is stable when run on its own output", () => {
    const inputs = [
      TRANSFER_NOTICE,
      "Hai luqmanul hakim,",
      "Hubungi Call Center 1500 035.",
      "dirumah saya",
      "kirim ke pada Bapak Budi... Terima Kasih!",
      "Hai budi terima kasih",
      "a.b.c",
    ];
    for (const input of inputs) {
      const once = sanitize(input);
      expect(sanitize(once)).toBe(once);
    }
  });

  it("merges caller lexicon entries with the defaults", () => {
    expect(sanitize("Saya pakai Mandiri")).toBe("Saya pakai mandiri");
    expect(sanitize("Saya pakai Mandiri", { exceptions: ["Mandiri"] })).toBe("Saya pakai Mandiri");
    expect(sanitize("Saya ke Pulau Seribu", { protectedHeads: ["Pulau"] })).toBe("Saya ke pulau Seribu");
  });

  it("honors the greeting name limit", () => {
    expect(sanitize("Hai ani budi", { greetingNameLimit: 1 })).toBe("Hai Ani budi");
  });

  it("throws a coded error for invalid options", () => {
    let caught: unknown;
    try {
      sanitize("halo", { greetingNameLimit: -1 });
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(Error);
    expect((caught as { code?: string }).code).toBe("INVALID_SANITIZE_OPTIONS");
    expect((caught as Error).message).toMatch(/^Invalid sanitize options: greetingNameLimit: /);
  });

  it("logs debug events when DEBUG_PUEBI is set", () => {
    process.env.DEBUG_PUEBI = "1";
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    expect(sanitize("Saya Pergi")).toBe("Saya pergi");

    expect(log).toHaveBeenCalledTimes(2);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      tag: "puebi",
      scope: "casing.decapitalize",
      event: "lowered",
      count: 1,
      words: ["Pergi"],
    });
    expect(JSON.parse(String(log.mock.calls[1]?.[0]))).toEqual({
      tag: "puebi",
      scope: "sanitize",
      event: "done",
      inputLength: 10,
      outputLength: 10,
      changed: true,
    });
  });

  it("stays quiet without DEBUG_PUEBI", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    sanitize("Saya Pergi");
    expect(log).not.toHaveBeenCalled();
  });
});
