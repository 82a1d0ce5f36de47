import { formatProfileTable } from "../table"

describe("formatProfileTable", () => {
  it("pads columns to the widest cell and marks the default", () => {
    const table = formatProfileTable([
      { name: "work", provider: "openrouter", model: "mixtral", isDefault: false },
      { name: "p", provider: "openai", model: "gpt-4", isDefault: true },
    ])

    expect(table).toBe(
      [
        "  NAME  PROVIDER    MODEL",
        "  work  openrouter  mixtral",
        "* p     openai      gpt-4",
        "",
      ].join("\n"),
    )
  })

  it("drops trailing spaces when the last cells are empty", () => {
    const table = formatProfileTable([
      { name: "bare", provider: "", model: "", isDefault: true },
    ])

    expect(table).toBe("  NAME  PROVIDER  MODEL\n* bare\n")
  })
})
