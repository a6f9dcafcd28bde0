import { describe, expect, test } from "vitest";
import { enrichHeadings, renderToc, slugify } from "./structured-content.js";

describe("slugify", () => {
  test("lower-cases, strips tags and punctuation", () => {
    expect(slugify("Hello, <em>World</em>!")).toBe("hello-world");
    expect(slugify("  Multiple   spaces -- here ")).toBe("multiple-spaces-here");
  });

  test("keeps letters and digits outside ASCII", () => {
    expect(slugify("Café Résumé")).toBe("café-résumé");
    expect(slugify("日本語")).toBe("日本語");
    expect(slugify("中文")).toBe("中文");
  });
});

describe("enrichHeadings", () => {
  test("demotes headings and adds ids", () => {
    expect(enrichHeadings("<h1>Intro</h1>\n<h2>Set <code>x</code> up</h2>\n").html).toBe(
      '<h2 id="intro">Intro</h2>\n<h3 id="set-x-up">Set <code>x</code> up</h3>\n'
    );
  });

  test("keeps h6 at h6", () => {
    expect(enrichHeadings("<h6>Deep</h6>").html).toBe('<h6 id="deep">Deep</h6>');
  });

  test("numbers repeated slugs", () => {
    expect(enrichHeadings("<h2>Notes</h2><h2>Notes</h2><h3>!!</h3>").html).toBe(
      '<h3 id="notes">Notes</h3><h3 id="notes-2">Notes</h3><h4 id="section">!!</h4>'
    );
  });

  test("gives non-Latin headings distinct ids", () => {
    expect(enrichHeadings("<h2>Привет</h2><h2>Мир</h2>").html).toBe(
      '<h3 id="привет">Привет</h3><h3 id="мир">Мир</h3>'
    );
  });

  test("collects demoted h2 and h3 headings for the contents", () => {
    const { toc } = enrichHeadings("<h1>One</h1><h2>Sub</h2><h3>Too deep</h3><h1>Two</h1>");
    expect(toc).toEqual([
      { id: "one", level: 2, text: "One" },
      { id: "sub", level: 3, text: "Sub" },
      { id: "two", level: 2, text: "Two" },
    ]);
  });
});

describe("renderToc", () => {
  const leader = '<span class="toc-leader" aria-hidden="true"></span>';

  test("renders nothing without headings", () => {
    expect(renderToc([])).toBe("");
  });

  test("numbers sections and nests subsections", () => {
    const html = renderToc([
      { id: "one", level: 2, text: "One" },
      { id: "sub", level: 3, text: "Sub" },
      { id: "two", level: 2, text: "Two" },
    ]);
    expect(html).toBe(
      '<div class="toc-anchor"><nav class="toc marginnote" aria-label="Contents">' +
        '<p class="toc-title">Contents</p><ol class="toc-list">' +
        `<li class="toc-l1"><a href="#one"><span class="toc-num">01</span><span class="toc-text">One</span>${leader}</a>` +
        '<ol class="toc-sub">' +
        `<li class="toc-l2"><a href="#sub"><span class="toc-num">01.1</span><span class="toc-text">Sub</span>${leader}</a></li>` +
        "</ol></li>" +
        `<li class="toc-l1"><a href="#two"><span class="toc-num">02</span><span class="toc-text">Two</span>${leader}</a></li>` +
        "</ol></nav></div>"
    );
  });

  test("lists an h3 before any h2 on its own", () => {
    const html = renderToc([{ id: "lead", level: 3, text: "Lead" }]);
    expect(html).toContain('<li class="toc-l1"><a href="#lead"><span class="toc-num">01</span>');
  });
});
