import { describe, it, expect } from "vitest";
import { DisabledWebSkill, htmlToMarkdown } from "../webSkill";

describe("htmlToMarkdown", () => {
  it("should decode entities and keep attribute text out of the body", () => {
    expect(htmlToMarkdown('<p title="a>b">Members&#8217; appeals &mdash; 60 days</p>')).toBe(
      "Members’ appeals — 60 days"
    );
  });

  it("should drop scripts and styles", () => {
    const html = "<style>p { color: red; }</style><p>Timely filing</p><script>var x = 1;</script>";
    expect(htmlToMarkdown(html)).toBe("Timely filing");
  });

  it("should keep headings and paragraphs as separate blocks", () => {
    expect(htmlToMarkdown("<h2>Appeals</h2><p>Submit within 60 days</p>")).toBe(
      "## Appeals\n\nSubmit within 60 days"
    );
  });
});

describe("DisabledWebSkill", () => {
  it("should return nothing for search and scrape", async () => {
    const web = new DisabledWebSkill();

    expect(web.enabled).toBe(false);
    expect(await web.search()).toEqual([]);
    expect(await web.scrape()).toBeNull();
  });
});
