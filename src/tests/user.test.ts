import request from "supertest";
import { TestContext, TestUser, buildTestApp, registerAndLogin, silenceConsole } from "./helpers";

describe("User Tests", () => {
  silenceConsole();

  let ctx: TestContext;
  let user: TestUser;

  const auth = (u: TestUser) => "Bearer " + u.accessToken;

  beforeEach(async () => {
    ctx = buildTestApp();
    user = await registerAndLogin(ctx.app, "volunteer@test.com");
  });

  test("returns the caller's profile", async () => {
    const response = await request(ctx.app).get("/users/me").set("Authorization", auth(user));

    expect(response.statusCode).toBe(200);
    expect(response.body).toMatchObject({
      id: user.userId,
      role: "VOLUNTEER",
      contact: "volunteer@test.com",
      consentFaceQr: false,
    });
  });

  test("creates a default profile for an account without one", async () => {
    ctx.stores.users.profiles.delete(user.userId);

    const response = await request(ctx.app).get("/users/me").set("Authorization", auth(user));

    expect(response.statusCode).toBe(200);
    expect(response.body.role).toBe("VOLUNTEER");
    expect(ctx.stores.users.profiles.has(user.userId)).toBe(true);
  });

  test("updates contact and consent", async () => {
    const response = await request(ctx.app)
      .put("/users/me")
      .set("Authorization", auth(user))
      .send({ contact: " +15550100 ", consentFaceQr: true });

    expect(response.statusCode).toBe(200);
    expect(response.body.contact).toBe("+15550100");
    expect(response.body.consentFaceQr).toBe(true);
  });

  test("a new email contact is normalized and becomes the login contact", async () => {
    const response = await request(ctx.app)
      .put("/users/me")
      .set("Authorization", auth(user))
      .send({ contact: " Other@Test.com " });

    expect(response.statusCode).toBe(200);
    expect(response.body.contact).toBe("other@test.com");
    expect(ctx.stores.users.accounts.get(user.userId)?.contact).toBe("other@test.com");

    const login = await request(ctx.app).post("/auth/token").send({ contact: "other@test.com", password: "123456" });
    expect(login.statusCode).toBe(200);
    expect(login.body.userId).toBe(user.userId);

    const oldLogin = await request(ctx.app)
      .post("/auth/token")
      .send({ contact: "volunteer@test.com", password: "123456" });
    expect(oldLogin.statusCode).toBe(401);
  });

  test("a contact held by another account is refused", async () => {
    await registerAndLogin(ctx.app, "taken@test.com");

    const response = await request(ctx.app)
      .put("/users/me")
      .set("Authorization", auth(user))
      .send({ contact: "Taken@Test.com", consentFaceQr: true });

    expect(response.statusCode).toBe(409);
    expect(response.body).toEqual({ success: false, error: "Contact already registered" });
    expect(ctx.stores.users.accounts.get(user.userId)?.contact).toBe("volunteer@test.com");
    expect(ctx.stores.users.profiles.get(user.userId)?.consentFaceQr).toBe(false);
  });

  test("rejects role changes, unknown values and empty updates", async () => {
    const role = await request(ctx.app).put("/users/me").set("Authorization", auth(user)).send({ role: "ADMIN" });
    expect(role.statusCode).toBe(403);
    expect(role.body.error).toBe("Role can only be changed by an administrator");

    const consent = await request(ctx.app)
      .put("/users/me")
      .set("Authorization", auth(user))
      .send({ consentFaceQr: "yes" });
    expect(consent.statusCode).toBe(400);
    expect(consent.body.error).toBe("consentFaceQr must be a boolean");

    const empty = await request(ctx.app).put("/users/me").set("Authorization", auth(user)).send({});
    expect(empty.statusCode).toBe(400);
    expect(empty.body.error).toBe("No updatable fields provided");

    expect(ctx.stores.users.profiles.get(user.userId)?.role).toBe("VOLUNTEER");
  });

  test("only administrators can set roles", async () => {
    const other = await registerAndLogin(ctx.app, "other@test.com");

    const refused = await request(ctx.app)
      .put(`/users/${other.userId}/role`)
      .set("Authorization", auth(user))
      .send({ role: "ADMIN" });
    expect(refused.statusCode).toBe(403);
    expect(refused.body.error).toBe("Only administrators can change roles");

    const admin = await registerAndLogin(ctx.app, "admin@test.com");
    const promoted = await request(ctx.app)
      .put(`/users/${other.userId}/role`)
      .set("Authorization", auth(admin))
      .send({ role: "ADMIN" });
    expect(promoted.statusCode).toBe(200);
    expect(promoted.body).toMatchObject({ id: other.userId, role: "ADMIN" });
  });

  test("setting a role validates the role and the target", async () => {
    const admin = await registerAndLogin(ctx.app, "admin@test.com");

    const invalid = await request(ctx.app)
      .put(`/users/${user.userId}/role`)
      .set("Authorization", auth(admin))
      .send({ role: "OWNER" });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.body.error).toBe("Role must be 'VOLUNTEER' or 'ADMIN'");

    const unknown = await request(ctx.app)
      .put("/users/user-99/role")
      .set("Authorization", auth(admin))
      .send({ role: "ADMIN" });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.body.error).toBe("User not found");
  });
});
