import { describe, expect, it } from "vitest";
import { collectEmbeddedSources, resolveEmbeddedPaths } from "../src/render/references.js";

describe("collectEmbeddedSources", () => {
  it("collects image syntax and html image tags but not links", () => {
    const markdown = [
      "# Screens",
      "",
      "![logo](./images/logo.png)",
      "",
      'Inline <img src="badge.svg" alt="badge"> here.',
      "",
      "<p align=\"center\"><img width=\"40\" src='/art/banner.jpg'></p>",
      "",
      "[a link](other.md)",
    ].join("\n");

    expect(collectEmbeddedSources(markdown).sort()).toEqual([
      "./images/logo.png",
      "/art/banner.jpg",
      "badge.svg",
    ]);
  });

  it("reports each source once", () => {
    expect(collectEmbeddedSources("![a](x.png) ![b](x.png)")).toEqual(["x.png"]);
  });
});

describe("resolveEmbeddedPaths", () => {
  const root = "/srv/docs";
  const page = "/srv/docs/guide/intro.md";

  it("resolves relative and root-relative sources inside the root", () => {
    expect(
      resolveEmbeddedPaths(root, page, ["./shot.png", "../logo.svg", "/art/banner.jpg"]),
    ).toEqual(["/srv/docs/guide/shot.png", "/srv/docs/logo.svg", "/srv/docs/art/banner.jpg"]);
  });

  it("drops remote urls, fragments and escapes", () => {
    expect(
      resolveEmbeddedPaths(root, page, [
        "https://example.com/a.png",
        "//cdn.example.com/b.png",
        "data:image/png;base64,AAAA",
        "#section",
        "../../../etc/passwd",
      ]),
    ).toEqual([]);
  });

  it("strips queries and decodes escapes", () => {
    expect(resolveEmbeddedPaths(root, page, ["my%20shot.png?v=2#top"])).toEqual([
      "/srv/docs/guide/my shot.png",
    ]);
  });
});
