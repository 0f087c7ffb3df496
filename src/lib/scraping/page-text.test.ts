import { describe, it, expect, vi } from "vitest"
import { extractPageText, scrapePageText } from "./page-text"

const RULEBOOK_HTML =
  "<html><head><title>Rulebook</title><style>p{color:red}</style></head><body>" +
  "<header>Menu</header><nav>Nav</nav>" +
  "<p>Part 1\n\n\n\nSection 2</p>" +
  "<p>Rule <b>1.1</b> applies.</p>" +
  "<aside>Ad</aside><footer>Footer</footer><script>track()</script>" +
  "</body></html>"

describe("extractPageText", () => {
  it("drops page chrome and collapses blank-line runs", () => {
    expect(extractPageText(RULEBOOK_HTML)).toBe(
      "Rulebook\nPart 1\n\nSection 2\nRule \n1.1\n applies."
    )
  })

  it("returns an empty string for a page with no text", () => {
    expect(extractPageText("<html><body><script>x()</script></body></html>")).toBe("")
  })
})

describe("scrapePageText", () => {
  it("fetches then extracts", async () => {
    const fetchHtml = vi.fn(async () => "<p>Rule 2</p>")
    expect(await scrapePageText("https://rules.test/1", fetchHtml)).toBe("Rule 2")
    expect(fetchHtml).toHaveBeenCalledWith("https://rules.test/1")
  })

  it("propagates fetch errors", async () => {
    const fetchHtml = vi.fn(async () => {
      throw new Error("timeout")
    })
    await expect(scrapePageText("https://rules.test/1", fetchHtml)).rejects.toThrow("timeout")
  })
})
