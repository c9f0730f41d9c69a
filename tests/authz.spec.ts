import { describe, expect, it } from "vitest";

import { authorize } from "../src/middleware/authz.js";
import type { Role } from "../src/modules/users/users.schemas.js";
import { AuthorizationError } from "../src/shared/errors.js";

const staff: ReadonlySet<Role> = new Set<Role>(["admin", "moderator"]);

describe("authorize", () => {
  it("lets listed roles through", () => {
    expect(() => authorize({ role: "admin" }, staff)).not.toThrow();
    expect(() => authorize({ role: "moderator" }, staff)).not.toThrow();
  });

  it("forbids everyone else", () => {
    expect(() => authorize({ role: "user" }, staff)).toThrow(AuthorizationError);
    expect(() => authorize({ role: "user" }, staff)).toThrow("FORBIDDEN");
  });

  it("forbids every role when nothing is allowed", () => {
    expect(() => authorize({ role: "admin" }, new Set<Role>())).toThrow(AuthorizationError);
  });
});
