import { describe, it, expect } from "vitest";
import { csvToMarkdownTable } from "../../../src/tools/files/csv-table.js";

describe("csvToMarkdownTable", () => {
  it("should render the first row as the header", () => {
    expect(csvToMarkdownTable("name,qty\napple,3\npear,10\n")).toBe(
      "| name | qty |\n| --- | --- |\n| apple | 3 |\n| pear | 10 |",
    );
  });

  it("should keep cell text as written", () => {
    expect(csvToMarkdownTable("id,date\n007,2024-01-02\n")).toBe(
      "| id | date |\n| --- | --- |\n| 007 | 2024-01-02 |",
    );
  });

  it("should escape pipes and pad short rows", () => {
    expect(csvToMarkdownTable('"a|b",c,d\n1\n')).toBe("| a\\|b | c | d |\n| --- | --- | --- |\n| 1 |  |  |");
  });

  it("should return an empty string for empty input", () => {
    expect(csvToMarkdownTable("")).toBe("");
  });
});
