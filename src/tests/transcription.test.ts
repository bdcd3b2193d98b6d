import { GeminiTranscriber } from "../services/transcription-service";

const mockGenerateContent = jest.fn();

jest.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: jest.fn(() => ({
    getGenerativeModel: () => ({ generateContent: mockGenerateContent }),
  })),
}));

const reply = (text: string) => ({ response: { text: () => text } });

describe("GeminiTranscriber", () => {
  let transcriber: GeminiTranscriber;

  beforeEach(() => {
    mockGenerateContent.mockReset();
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    transcriber = new GeminiTranscriber("test-key", "gemini-1.5-flash");
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("sends the audio inline and trims the transcript", async () => {
    mockGenerateContent.mockResolvedValue(reply("  I found a phone near gate 3 \n"));

    const text = await transcriber.transcribe(Buffer.from("voice"), "audio/webm");

    expect(text).toBe("I found a phone near gate 3");
    const [parts] = mockGenerateContent.mock.calls[0];
    expect(parts[0]).toEqual({ inlineData: { data: Buffer.from("voice").toString("base64"), mimeType: "audio/webm" } });
  });

  test("an empty transcript is null", async () => {
    mockGenerateContent.mockResolvedValue(reply("   "));

    expect(await transcriber.transcribe(Buffer.from("voice"), "audio/webm")).toBeNull();
  });

  test("API errors are logged and give null", async () => {
    mockGenerateContent.mockRejectedValue(new Error("quota exceeded"));

    expect(await transcriber.transcribe(Buffer.from("voice"), "audio/webm")).toBeNull();
    expect(console.error).toHaveBeenCalled();
  });
});
