import { describe, expect, it } from "vitest";

import type { Contact } from "../src/modules/contacts/contacts.schemas.js";
import { parseIsoDate } from "../src/modules/contacts/contacts.schemas.js";
import { daysUntilBirthday, upcomingBirthdays } from "../src/modules/contacts/contacts.service.js";

function contact(id: number, birthday: string): Contact {
  const at = new Date("2024-01-01T00:00:00.000Z");
  return {
    id,
    userId: 1,
    fullname: `Contact ${id}`,
    email: `c${id}@example.com`,
    phoneNumber: "+1 555 0100",
    birthday,
    notes: null,
    createdAt: at,
    updatedAt: at,
  };
}

describe("parseIsoDate", () => {
  it("accepts real calendar dates only", () => {
    expect(parseIsoDate("2024-02-29")).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseIsoDate("2023-02-29")).toBeNull();
    expect(parseIsoDate("2024-2-9")).toBeNull();
    expect(parseIsoDate("yesterday")).toBeNull();
  });
});

describe("daysUntilBirthday", () => {
  it("counts to this year's anniversary, or next year's once passed", () => {
    expect(daysUntilBirthday("1990-06-01", "2024-06-01")).toBe(0);
    expect(daysUntilBirthday("1990-06-08", "2024-06-01")).toBe(7);
    expect(daysUntilBirthday("1990-05-31", "2024-06-01")).toBe(364);
    expect(daysUntilBirthday("1990-01-02", "2024-12-28")).toBe(5);
  });

  it("moves Feb 29 birthdays to Feb 28 in common years", () => {
    expect(daysUntilBirthday("2000-02-29", "2023-02-27")).toBe(1);
    expect(daysUntilBirthday("2000-02-29", "2024-02-28")).toBe(1);
    expect(daysUntilBirthday("2000-03-01", "2024-02-28")).toBe(2);
  });

  it("returns null for malformed dates", () => {
    expect(daysUntilBirthday("not-a-date", "2024-06-01")).toBeNull();
  });
});

describe("upcomingBirthdays", () => {
  it("keeps the inclusive window and orders by closeness, then id", () => {
    const list = [
      contact(1, "1980-06-09"),
      contact(2, "1985-06-08"),
      contact(3, "1999-06-03"),
      contact(4, "2001-06-03"),
      contact(5, "1990-06-01"),
    ];

    expect(upcomingBirthdays(list, "2024-06-01").map((c) => c.id)).toEqual([5, 3, 4, 2]);
    expect(upcomingBirthdays(list, "2024-06-01", 2).map((c) => c.id)).toEqual([5, 3, 4]);
  });
});
