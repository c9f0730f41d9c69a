import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import type { Role } from "../src/modules/users/users.schemas.js";
import { makeApp, type TestHarness } from "./test-app.js";

const grace = {
  fullname: "Grace Hopper",
  email: "Grace@Navy.mil",
  phone_number: "+1 555 0100",
  birthday: "1906-12-09",
  notes: "admiral",
};

async function tokenFor(h: TestHarness, email: string, role: Role = "user"): Promise<string> {
  await h.seedUser({ email, password: "password123", role });
  const pair = await h.login(email, "password123");
  return pair.access_token;
}

function auth(token: string): { Authorization: string } {
  return { Authorization: `Bearer ${token}` };
}

describe("contacts CRUD", () => {
  let h: TestHarness;
  let ada: string;

  beforeEach(async () => {
    h = makeApp();
    ada = await tokenFor(h, "ada@example.com");
  });

  it("creates a contact owned by the caller", async () => {
    const res = await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);

    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      id: 1,
      fullname: "Grace Hopper",
      email: "grace@navy.mil",
      phone_number: "+1 555 0100",
      birthday: "1906-12-09",
      notes: "admiral",
      user_id: 1,
      created_at: "2024-01-01T00:00:00.000Z",
      updated_at: "2024-01-01T00:00:00.000Z",
    });
  });

  it("rejects a second contact with the same email", async () => {
    await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);

    const res = await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ success: false, code: "CONFLICT", error: "Contact already exists!" });
  });

  it("validates phone numbers and dates", async () => {
    const badPhone = await request(h.app)
      .post("/contacts/contacts")
      .set(auth(ada))
      .send({ ...grace, phone_number: "call me" });
    const badDate = await request(h.app)
      .post("/contacts/contacts")
      .set(auth(ada))
      .send({ ...grace, birthday: "2023-02-30" });

    expect(badPhone.status).toBe(400);
    expect(badPhone.body.error).toBe("phone_number: Invalid phone number");
    expect(badDate.status).toBe(400);
    expect(badDate.body.error).toBe("birthday: Invalid date format. Use YYYY-MM-DD");
  });

  it("finds a contact by id, name and email", async () => {
    await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);

    const byId = await request(h.app).get("/contacts/contacts/id/1").set(auth(ada));
    const byName = await request(h.app).get("/contacts/contacts/by_name/Grace%20Hopper").set(auth(ada));
    const byEmail = await request(h.app).get("/contacts/contacts/by_email/GRACE@navy.mil").set(auth(ada));

    for (const res of [byId, byName, byEmail]) {
      expect(res.status).toBe(200);
      expect(res.body.id).toBe(1);
    }
  });

  it("returns 404 for missing contacts and 400 for bad ids", async () => {
    const missing = await request(h.app).get("/contacts/contacts/id/42").set(auth(ada));
    const badId = await request(h.app).get("/contacts/contacts/id/abc").set(auth(ada));
    const outOfRange = await request(h.app).get("/contacts/contacts/id/9999999999").set(auth(ada));

    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ success: false, code: "NOT_FOUND", error: "Contact not found" });
    expect(badId.status).toBe(400);
    expect(outOfRange.status).toBe(400);
    expect(outOfRange.body.code).toBe("VALIDATION_ERROR");
  });

  it("hides other users' contacts", async () => {
    await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);
    const bob = await tokenFor(h, "bob@example.com");

    const read = await request(h.app).get("/contacts/contacts/id/1").set(auth(bob));
    const remove = await request(h.app).delete("/contacts/contacts/delete/1").set(auth(bob));

    expect(read.status).toBe(404);
    expect(remove.status).toBe(404);
    expect(h.contacts.contacts).toHaveLength(1);
  });

  it("updates a contact", async () => {
    await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);

    const res = await request(h.app)
      .put("/contacts/contacts/update/1")
      .set(auth(ada))
      .send({ ...grace, fullname: "Rear Admiral Grace Hopper", notes: null });

    expect(res.status).toBe(200);
    expect(res.body).toEqual(
      expect.objectContaining({ id: 1, fullname: "Rear Admiral Grace Hopper", email: "grace@navy.mil", notes: null })
    );

    const missing = await request(h.app).put("/contacts/contacts/update/9").set(auth(ada)).send(grace);
    expect(missing.status).toBe(404);
  });

  it("refuses an update that takes another contact's email", async () => {
    await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);
    await request(h.app)
      .post("/contacts/contacts")
      .set(auth(ada))
      .send({ ...grace, fullname: "Alan Turing", email: "alan@example.org" });

    const res = await request(h.app)
      .put("/contacts/contacts/update/2")
      .set(auth(ada))
      .send({ ...grace, fullname: "Alan Turing" });

    expect(res.status).toBe(409);
  });

  it("deletes a contact once", async () => {
    await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);

    const first = await request(h.app).delete("/contacts/contacts/delete/1").set(auth(ada));
    const second = await request(h.app).delete("/contacts/contacts/delete/1").set(auth(ada));

    expect(first.status).toBe(200);
    expect(first.body).toEqual({ detail: "Contact deleted successfully" });
    expect(second.status).toBe(404);
  });

  it("requires authentication", async () => {
    const res = await request(h.app).post("/contacts/contacts").send(grace);

    expect(res.status).toBe(401);
    expect(h.contacts.contacts).toHaveLength(0);
  });
});

describe("GET /contacts/contacts/all", () => {
  it("is forbidden to plain users", async () => {
    const h = makeApp();
    const ada = await tokenFor(h, "ada@example.com");

    const res = await request(h.app).get("/contacts/contacts/all").set(auth(ada));

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ success: false, code: "FORBIDDEN", error: "FORBIDDEN" });
  });

  it("lists every user's contacts for admins and moderators", async () => {
    const h = makeApp();
    const ada = await tokenFor(h, "ada@example.com");
    const bob = await tokenFor(h, "bob@example.com");
    const admin = await tokenFor(h, "root@example.com", "admin");
    const moderator = await tokenFor(h, "mod@example.com", "moderator");
    await request(h.app).post("/contacts/contacts").set(auth(ada)).send(grace);
    await request(h.app).post("/contacts/contacts").set(auth(bob)).send(grace);

    const asAdmin = await request(h.app).get("/contacts/contacts/all").set(auth(admin));
    const asModerator = await request(h.app).get("/contacts/contacts/all?limit=1&offset=1").set(auth(moderator));

    expect(asAdmin.status).toBe(200);
    expect(asAdmin.body.map((c: { user_id: number }) => c.user_id)).toEqual([1, 2]);
    expect(asModerator.status).toBe(200);
    expect(asModerator.body).toHaveLength(1);
    expect(asModerator.body[0].user_id).toBe(2);
  });

  it("rejects out-of-range pagination", async () => {
    const h = makeApp();
    const admin = await tokenFor(h, "root@example.com", "admin");

    const res = await request(h.app).get("/contacts/contacts/all?limit=0").set(auth(admin));

    expect(res.status).toBe(400);
    expect(res.body.code).toBe("VALIDATION_ERROR");
  });

  it("throttles before checking the role", async () => {
    const h = makeApp({ config: { rateLimitEnabled: true } });
    const ada = await tokenFor(h, "ada@example.com");

    const first = await request(h.app).get("/contacts/contacts/all").set(auth(ada));
    const second = await request(h.app).get("/contacts/contacts/all").set(auth(ada));

    expect(first.status).toBe(403);
    expect(second.status).toBe(429);
  });

  it("ignores X-Forwarded-For when no proxy is trusted", async () => {
    const h = makeApp({ config: { rateLimitEnabled: true } });
    const ada = await tokenFor(h, "ada@example.com");

    const statuses: number[] = [];
    for (const ip of ["198.51.100.1", "198.51.100.2", "198.51.100.3"]) {
      const res = await request(h.app).get("/contacts/contacts/all").set(auth(ada)).set("X-Forwarded-For", ip);
      statuses.push(res.status);
    }

    expect(statuses).toEqual([403, 429, 429]);
  });
});

describe("birthday window", () => {
  async function withBirthdays(birthdays: string[]) {
    const h = makeApp();
    const ada = await tokenFor(h, "ada@example.com");
    for (const [i, birthday] of birthdays.entries()) {
      await request(h.app)
        .post("/contacts/contacts")
        .set(auth(ada))
        .send({ ...grace, fullname: `Contact ${i + 1}`, email: `c${i + 1}@example.com`, birthday });
    }
    return { h, ada };
  }

  it("GET /birthdays lists the next seven days from today, soonest first", async () => {
    // today is 2024-06-01
    const { h, ada } = await withBirthdays(["1985-06-08", "1980-06-09", "1990-06-01", "1970-05-31", "2000-06-03"]);

    const res = await request(h.app).get("/contacts/contacts/birthdays").set(auth(ada));

    expect(res.status).toBe(200);
    expect(res.body.map((c: { birthday: string }) => c.birthday)).toEqual(["1990-06-01", "2000-06-03", "1985-06-08"]);
  });

  it("GET /get_new_day/:date wraps into the next year", async () => {
    const { h, ada } = await withBirthdays(["1990-01-02", "1990-12-28", "1990-01-05"]);

    const res = await request(h.app).get("/contacts/contacts/get_new_day/2024-12-28").set(auth(ada));

    expect(res.status).toBe(200);
    expect(res.body.map((c: { birthday: string }) => c.birthday)).toEqual(["1990-12-28", "1990-01-02"]);
  });

  it("GET /get_new_day/:date rejects impossible dates", async () => {
    const { h, ada } = await withBirthdays([]);

    const res = await request(h.app).get("/contacts/contacts/get_new_day/2024-13-01").set(auth(ada));

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid date format. Use YYYY-MM-DD");
  });
});
