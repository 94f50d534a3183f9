import { describe, expect, it } from "vitest"
import { applicationFormSchema, applicationRecordSchema } from "../schemas/application.schema"
import { isApplicationSource, isFlashMessage } from "../guards"

const validForm = {
  first_name: "Ada",
  last_name: "Lovelace",
  email: "ada@example.com",
}

describe("applicationFormSchema", () => {
  it("trims required fields and nulls absent optional ones", () => {
    const parsed = applicationFormSchema.parse({ ...validForm, first_name: "  Ada  ", city: "" })

    expect(parsed.first_name).toBe("Ada")
    expect(parsed.city).toBeNull()
    expect(parsed.phone).toBeNull()
  })

  it("keeps the first value of a repeated field", () => {
    const parsed = applicationFormSchema.parse({ ...validForm, position: ["Engineer", "Designer"] })
    expect(parsed.position).toBe("Engineer")
  })

  it("reports required fields in form order", () => {
    const result = applicationFormSchema.safeParse({ email: "   " })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path[0])).toEqual(["first_name", "last_name", "email"])
    }
  })
})

describe("applicationRecordSchema", () => {
  it("rejects an unknown source", () => {
    const result = applicationRecordSchema.safeParse({
      id: 1,
      firstName: "Ada",
      lastName: "Lovelace",
      email: "ada@example.com",
      phone: null,
      country: null,
      city: null,
      address: null,
      position: null,
      additionalInfo: null,
      resumeFilename: null,
      submittedAt: "2025-01-01T00:00:00.000Z",
      source: "crawler",
      ipAddress: null,
    })
    expect(result.success).toBe(false)
  })
})

describe("guards", () => {
  it("recognizes application sources", () => {
    expect(isApplicationSource("bot")).toBe(true)
    expect(isApplicationSource("direct")).toBe(true)
    expect(isApplicationSource("BOT")).toBe(false)
    expect(isApplicationSource(null)).toBe(false)
  })

  it("recognizes flash messages", () => {
    expect(isFlashMessage({ category: "error", message: "Missing required field: Email" })).toBe(true)
    expect(isFlashMessage({ category: "warning", message: "x" })).toBe(false)
    expect(isFlashMessage(["error", "x"])).toBe(false)
  })
})
