import { describe, expect, it } from "vitest";
import { extractCompanies, parseMarketData } from "./companyExtractor";

describe("extractCompanies", () => {
  it("produces one record per blank-line separated block", () => {
    const text = [
      "Company: Northwind Pay",
      "Website: https://northwind.example",
      "Country: Germany",
      "Characteristics: instant payouts for merchants",
      "https://northwind.example/payouts",
      "https://news.example/northwind",
      "",
      "Company: Harbor Lending",
      "Country: Canada",
    ].join("\n");

    expect(extractCompanies(text)).toEqual([
      {
        name: "Northwind Pay",
        website: "https://northwind.example",
        country: "Germany",
        characteristics: "instant payouts for merchants",
        links: [
          "https://northwind.example/payouts",
          "https://news.example/northwind",
        ],
      },
      { name: "Harbor Lending", country: "Canada" },
    ]);
  });

  it("matches labels case-insensitively, including Cyrillic labels", () => {
    const text = [
      "КОМПАНИЯ: Сбер",
      "сайт: https://sber.example",
      "Страна: Россия",
      "Характеристики: выплаты за минуту",
    ].join("\n");

    expect(extractCompanies(text)).toEqual([
      {
        name: "Сбер",
        website: "https://sber.example",
        country: "Россия",
        characteristics: "выплаты за минуту",
      },
    ]);
  });

  it("starts a new record when a name label appears without a blank line", () => {
    const text = "Name: Alpha\nProduct: Beta\nURL: https://beta.example";

    expect(extractCompanies(text)).toEqual([
      { name: "Alpha" },
      { name: "Beta", website: "https://beta.example" },
    ]);
  });

  it("strips list markers and bold labels", () => {
    const text = "- **Company:** Gamma Bank\n- **Country:** Spain";

    expect(extractCompanies(text)).toEqual([
      { name: "Gamma Bank", country: "Spain" },
    ]);
  });

  it("strips emphasis that wraps the whole labelled line", () => {
    expect(extractCompanies("**Company: Gamma Bank**")).toEqual([
      { name: "Gamma Bank" },
    ]);
  });

  it("keeps underscores and asterisks inside values and links", () => {
    const text = [
      "Company: Acme",
      "Website: https://acme.test/pay__outs",
      "https://news.test/a__b",
      "Characteristics: 2**10 merchants onboarded",
    ].join("\n");

    expect(extractCompanies(text)).toEqual([
      {
        name: "Acme",
        website: "https://acme.test/pay__outs",
        characteristics: "2**10 merchants onboarded",
        links: ["https://news.test/a__b"],
      },
    ]);
  });

  it("ignores field lines that appear before any company", () => {
    const text = "Country: Nowhere\nhttps://orphan.example\nSome prose.";

    expect(extractCompanies(text)).toEqual([]);
  });

  it("ignores unrecognised lines inside a block", () => {
    const text = "Company: Delta\nFounded in 2015 by two engineers.";

    expect(extractCompanies(text)).toEqual([{ name: "Delta" }]);
  });
});

describe("parseMarketData", () => {
  it("keeps the raw text and counts parsed companies", () => {
    const collectedAt = new Date("2026-03-01T10:00:00.000Z");
    const data = parseMarketData("Company: Epsilon", "feature", collectedAt);

    expect(data).toEqual({
      rawContent: "Company: Epsilon",
      companies: [{ name: "Epsilon" }],
      kind: "feature",
      collectedAt,
      totalFound: 1,
    });
  });
});
