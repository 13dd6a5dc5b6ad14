import { cleanText } from "../sanitize";

describe("cleanText", () => {
  it("trims surrounding whitespace", () => {
    expect(cleanText("  Cache \n")).toBe("Cache");
  });

  it("drops script elements with their content", () => {
    expect(cleanText("  <script>alert(1)</script>Cache  ")).toBe("Cache");
  });

  it("removes event handler attributes but keeps formatting tags", () => {
    expect(cleanText('<p onclick="steal()">Hi</p>')).toBe("<p>Hi</p>");
  });

  it("removes javascript: links", () => {
    expect(cleanText('<a href="javascript:alert(1)">x</a>')).toBe("<a>x</a>");
  });

  it("drops tags outside the allow list", () => {
    expect(cleanText('<img src="x" onerror="alert(1)">Term')).toBe("Term");
  });

  it("returns an empty string for markup-only input", () => {
    expect(cleanText("<script>x</script>")).toBe("");
  });
});
