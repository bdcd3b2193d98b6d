import request from "supertest";
import { FakeTranscriber, TestContext, TestUser, buildTestApp, registerAndLogin, silenceConsole } from "./helpers";

describe("Audio Transcription Tests", () => {
  silenceConsole();

  let ctx: TestContext;
  let user: TestUser;

  const setup = async (transcriber: FakeTranscriber | null) => {
    ctx = buildTestApp({ transcriber });
    user = await registerAndLogin(ctx.app, "volunteer@test.com");
  };

  const upload = (filename: string, contentType: string) =>
    request(ctx.app)
      .post("/transcribe-audio")
      .set("Authorization", "Bearer " + user.accessToken)
      .attach("audio", Buffer.from("voice"), { filename, contentType });

  test("returns the transcript", async () => {
    await setup(new FakeTranscriber("I lost my keys"));

    const response = await upload("note.webm", "audio/webm");

    expect(response.statusCode).toBe(200);
    expect(response.body).toEqual({ transcribedText: "I lost my keys" });
  });

  test("a failed transcription is a server error", async () => {
    await setup(new FakeTranscriber(null));

    const response = await upload("note.webm", "audio/webm");

    expect(response.statusCode).toBe(500);
    expect(response.body).toEqual({ success: false, error: "Audio transcription failed." });
  });

  test("answers 503 when no transcriber is configured", async () => {
    await setup(null);

    const response = await upload("note.webm", "audio/webm");

    expect(response.statusCode).toBe(503);
    expect(response.body.error).toBe("Audio transcription is not configured");
  });

  test("requires an audio file", async () => {
    await setup(new FakeTranscriber("unused"));

    const missing = await request(ctx.app)
      .post("/transcribe-audio")
      .set("Authorization", "Bearer " + user.accessToken);
    expect(missing.statusCode).toBe(400);
    expect(missing.body.error).toBe("Missing required file: audio");

    const wrongType = await upload("notes.txt", "text/plain");
    expect(wrongType.statusCode).toBe(400);
    expect(wrongType.body.error).toBe("File notes.txt is not an audio file");
  });
});
