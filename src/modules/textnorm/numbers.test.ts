import { describe, it, expect } from "vitest";
import { expandNumbers, numberToVietnamese } from "./numbers";

describe("numberToVietnamese", () => {
  it.each([
    [0, "không"],
    [7, "bảy"],
    [10, "mười"],
    [11, "mười một"],
    [15, "mười lăm"],
    [20, "hai mươi"],
    [21, "hai mươi mốt"],
    [25, "hai mươi lăm"],
    [55, "năm mươi lăm"],
    [99, "chín mươi chín"],
  ])("reads %i below one hundred", (n, words) => {
    expect(numberToVietnamese(n)).toBe(words);
  });

  it.each([
    [100, "một trăm"],
    [101, "một trăm lẻ một"],
    [105, "một trăm lẻ năm"],
    [110, "một trăm mười"],
    [115, "một trăm mười lăm"],
    [500, "năm trăm"],
  ])("reads hundreds: %i", (n, words) => {
    expect(numberToVietnamese(n)).toBe(words);
  });

  it.each([
    [1000, "một nghìn"],
    [1001, "một nghìn không trăm một"],
    [1010, "một nghìn không trăm mười"],
    [1100, "một nghìn một trăm"],
    [12345, "mười hai nghìn ba trăm bốn mươi lăm"],
    [21015, "hai mươi mốt nghìn không trăm mười lăm"],
    [100005, "một trăm nghìn không trăm năm"],
    [999999, "chín trăm chín mươi chín nghìn chín trăm chín mươi chín"],
  ])("reads thousands: %i", (n, words) => {
    expect(numberToVietnamese(n)).toBe(words);
  });

  it("reads one million and above digit by digit", () => {
    expect(numberToVietnamese(1_000_000)).toBe("một không không không không không không");
    expect(numberToVietnamese(1234567)).toBe("một hai ba bốn năm sáu bảy");
  });

  it("prefixes negatives with âm", () => {
    expect(numberToVietnamese(-7)).toBe("âm bảy");
    expect(numberToVietnamese(-21)).toBe("âm hai mươi mốt");
  });

  it("reads integers past 2^53 digit by digit", () => {
    expect(numberToVietnamese(2 ** 53)).toBe("chín không không bảy một chín chín hai năm bốn bảy bốn không chín chín hai");
    expect(numberToVietnamese(1e21)).toBe(
      "một " + Array.from({ length: 21 }, () => "không").join(" "),
    );
    expect(numberToVietnamese(-(2 ** 53))).toBe(
      "âm chín không không bảy một chín chín hai năm bốn bảy bốn không chín chín hai",
    );
  });

  it("accepts bigint", () => {
    expect(numberToVietnamese(15n)).toBe("mười lăm");
    expect(numberToVietnamese(-105n)).toBe("âm một trăm lẻ năm");
    expect(numberToVietnamese(12345678901234567890n)).toBe(
      "một hai ba bốn năm sáu bảy tám chín không một hai ba bốn năm sáu bảy tám chín không",
    );
  });

  it("rejects values that are not integers", () => {
    expect(() => numberToVietnamese(1.5)).toThrow(RangeError);
    expect(() => numberToVietnamese(Number.NaN)).toThrow(RangeError);
    expect(() => numberToVietnamese(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});

describe("expandNumbers", () => {
  it("expands standalone digit runs", () => {
    expect(expandNumbers("tôi có 15 con mèo")).toBe("tôi có mười lăm con mèo");
    expect(expandNumbers("năm 2024")).toBe("năm hai nghìn không trăm hai mươi bốn");
  });

  it("leaves digits glued to letters alone", () => {
    expect(expandNumbers("ISO9001")).toBe("ISO9001");
    expect(expandNumbers("12abc")).toBe("12abc");
    expect(expandNumbers("x_12")).toBe("x_12");
  });

  it("treats Vietnamese letters as word characters", () => {
    expect(expandNumbers("phòng3")).toBe("phòng3");
    expect(expandNumbers("đ5")).toBe("đ5");
  });

  it("splits at punctuation and reads leading zeros as the value", () => {
    expect(expandNumbers("1.000.000")).toBe("một.không.không");
    expect(expandNumbers("mã 007")).toBe("mã bảy");
  });

  it("reads very long digit runs exactly, one digit at a time", () => {
    expect(expandNumbers("số 12345678901234567890 nhé")).toBe(
      "số một hai ba bốn năm sáu bảy tám chín không một hai ba bốn năm sáu bảy tám chín không nhé",
    );
    expect(expandNumbers("mã 0000000000000000007")).toBe("mã bảy");
  });

  it("returns text without digits unchanged", () => {
    expect(expandNumbers("")).toBe("");
    expect(expandNumbers("xin chào")).toBe("xin chào");
  });
});
