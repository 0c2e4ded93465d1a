import { describe, it, expect } from "vitest";
import { cleanLatex, parseBibtex, parseEntry, readField, readFields, sortByYearDesc, unescapeLatex } from "../src/bib/index.js";


describe("bib latex", () => {
  it("按表替换已知转义", () => {
    expect(unescapeLatex(String.raw`\r{A} \AA{} Caf\'e \v{s}`)).toBe("Å Å Café š");
  });

  it("cleanLatex 之后不留花括号", () => {
    expect(cleanLatex(String.raw`{The {\r{A}}ngstr\"om} limit`)).toBe(String.raw`The Ångstr\"om limit`);
  });

  it("重复执行结果不变", () => {
    const once = unescapeLatex(String.raw`\v{s}ukys \AA{}se`);
    expect(unescapeLatex(once)).toBe(once);
  });
});


describe("bib readField", () => {
  it("支持花括号、引号与裸值", () => {
    const block = String.raw`key,
  title = {A {Nested} Title},
  journal = "Phys. Rev. {D}",
  year = 2020,
}`;
    expect(readField(block, "title")).toBe("A {Nested} Title");
    expect(readField(block, "journal")).toBe("Phys. Rev. {D}");
    expect(readField(block, "year")).toBe("2020");
  });

  it("字段名整词匹配，booktitle 不算 title", () => {
    expect(readField("key, booktitle = {Proceedings}", "title")).toBeUndefined();
  });

  it("未闭合的值视为缺失", () => {
    expect(readField("key, title = {never closed", "title")).toBeUndefined();
  });

  it("其他字段值里的 name= 不算字段", () => {
    const block = "k, url = {https://example.org/record?title=Wrong&id=3}, title = {Right Title}, year = {2020}}";
    expect(readField(block, "title")).toBe("Right Title");
    expect(readField(block, "year")).toBe("2020");
  });

  it("引号值里的 name= 同样被整体跳过", () => {
    const block = `k, note = "erratum: year=1999 misprinted", year = {2020}}`;
    expect(readField(block, "year")).toBe("2020");
    expect(readField(block, "note")).toBe("erratum: year=1999 misprinted");
  });
});


describe("bib readFields", () => {
  it("按顺序列出字段，名称转小写，同名取第一个", () => {
    const fields = readFields(`key,
  Title = {First},
  title = {Second},
  year = 2021
}`);
    expect([...fields.entries()]).toEqual([
      ["title", "First"],
      ["year", "2021"],
    ]);
  });

  it("没有引用键时从头读起", () => {
    expect(readFields("title = {Keyless}, year = {2022}").get("year")).toBe("2022");
  });
});


describe("bib parseEntry", () => {
  it("合并空白并清理转义", () => {
    const pub = parseEntry(`key,
  title = {Black   holes
     and {islands}},
  author = {Folkestad, \\r{A}smund and  Someone Else}
`);
    expect(pub).toEqual({
      title: "Black holes and islands",
      authors: "Folkestad, Åsmund and Someone Else",
    });
  });

  it("年份必须是四位数字", () => {
    expect(parseEntry("key, year = {in press}").year).toBeUndefined();
    expect(parseEntry("key, year = {1999}").year).toBe("1999");
  });

  it("eprint 映射到 arxiv", () => {
    expect(parseEntry("key, eprint = {2101.00001}, doi = {10.1/x}")).toEqual({ arxiv: "2101.00001", doi: "10.1/x" });
  });
});


describe("bib parseBibtex", () => {
  it("一个字段都没有的块被丢弃，不抛错", () => {
    const pubs = parseBibtex(`@article{empty, note = {nothing here}}
@article{ok, title = {Kept}}
@misc{broken, title = {unterminated`);
    expect(pubs).toEqual([{ title: "Kept" }]);
  });

  it("note 里的 year= 不影响真正的年份", () => {
    const pubs = parseBibtex("@article{k, note = {erratum: year=1999 misprinted}, title = {Right Title}, year = {2020}}");
    expect(pubs).toEqual([{ title: "Right Title", year: "2020" }]);
  });

  it("跳过 @comment / @string", () => {
    const pubs = parseBibtex(`@string{jhep = "JHEP"}
@comment{title = {Not a paper}}
@article{real, title = {Real}}`);
    expect(pubs).toEqual([{ title: "Real" }]);
  });

  it("空输入返回空数组", () => {
    expect(parseBibtex("")).toEqual([]);
  });
});


describe("bib sortByYearDesc", () => {
  it("按年份降序，无年份排最后，同年保持原顺序", () => {
    const sorted = sortByYearDesc([
      { title: "none" },
      { title: "a", year: "2019" },
      { title: "b", year: "2023" },
      { title: "c", year: "2019" },
    ]);
    expect(sorted.map((p) => p.title)).toEqual(["b", "a", "c", "none"]);
  });
});
