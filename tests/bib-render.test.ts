import { describe, it, expect } from "vitest";
import { highlightAuthor, publicationLink, renderPublication, renderPublications, venueLine } from "../src/bib/index.js";


const AUTHOR = { surname: "Folkestad", givenName: "Åsmund", initials: "Å.F." };
const SPAN = '<span class="highlight-author">Å.F.</span>';


describe("bib publicationLink", () => {
  it("同时有 arXiv 与 DOI 时链接 arXiv", () => {
    expect(publicationLink({ arxiv: "2101.00001", doi: "10.1/x" })).toBe("https://arxiv.org/abs/2101.00001");
  });

  it("只有 DOI 时链接 doi.org", () => {
    expect(publicationLink({ doi: "10.1/x" })).toBe("https://doi.org/10.1/x");
  });

  it("都没有返回 null", () => {
    expect(publicationLink({ title: "t" })).toBeNull();
  });
});


describe("bib highlightAuthor", () => {
  it("高亮 姓, 名 写法且只出现一次", () => {
    const out = highlightAuthor("Folkestad, Åsmund and Someone Else", AUTHOR);
    expect(out).toBe(`${SPAN} and Someone Else`);
    expect(out.split(SPAN).length - 1).toBe(1);
  });

  it("高亮 名 姓 写法", () => {
    expect(highlightAuthor("Someone Else and Åsmund  Folkestad", AUTHOR)).toBe(`Someone Else and ${SPAN}`);
  });

  it("其他作者原样保留", () => {
    expect(highlightAuthor("Ada Lovelace", AUTHOR)).toBe("Ada Lovelace");
  });
});


describe("bib venueLine", () => {
  it("期刊 卷, 页码 (年份)", () => {
    expect(venueLine({ journal: "JHEP", volume: "12", pages: "1--20", year: "2021" })).toBe("JHEP 12, 1--20 (2021)");
  });

  it("无期刊时退回 arXiv 编号", () => {
    expect(venueLine({ arxiv: "2301.12345", year: "2023" })).toBe("arXiv:2301.12345 (2023)");
  });

  it("只有年份", () => {
    expect(venueLine({ year: "2019" })).toBe("(2019)");
  });

  it("什么都没有返回 null", () => {
    expect(venueLine({ title: "t", doi: "10.1/x" })).toBeNull();
  });
});


describe("bib renderPublication", () => {
  it("标题、作者、期刊三行", () => {
    const html = renderPublication(
      { title: "Islands", authors: "Folkestad, Åsmund", journal: "JHEP", year: "2022", arxiv: "2201.1" },
      AUTHOR,
    );
    expect(html).toBe(
      [
        '<div class="paper-entry">',
        '    <a href="https://arxiv.org/abs/2201.1" target="_blank" class="paper-title">Islands</a>',
        `    <div class="paper-authors">${SPAN}</div>`,
        '    <div class="paper-venue">JHEP (2022)</div>',
        "</div>",
      ].join("\n"),
    );
  });

  it("无链接、无标题", () => {
    expect(renderPublication({ authors: "A & B" }, AUTHOR)).toBe(
      '<div class="paper-entry">\n    <span class="paper-title">Untitled</span>\n    <div class="paper-authors">A &amp; B</div>\n</div>',
    );
  });

  it("列表外层容器与空行分隔", () => {
    const html = renderPublications([{ title: "One" }], AUTHOR);
    expect(html).toBe(
      '<div class="publications-list">\n\n<div class="paper-entry">\n    <span class="paper-title">One</span>\n</div>\n\n</div>',
    );
  });
});
