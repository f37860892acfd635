import { describe, expect, it } from "vitest";
import { openCommandFor } from "../src/open-browser.js";

describe("openCommandFor", () => {
  const url = "http://127.0.0.1:4000/";

  it("uses the platform's opener", () => {
    expect(openCommandFor("darwin", url)).toEqual({ command: "open", args: [url] });
    expect(openCommandFor("linux", url)).toEqual({ command: "xdg-open", args: [url] });
    expect(openCommandFor("win32", url)).toEqual({
      command: "cmd",
      args: ["/c", "start", "", url],
    });
  });
});
