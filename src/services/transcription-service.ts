import { GoogleGenerativeAI, GenerativeModel } from "@google/generative-ai";

export interface Transcriber {
  /** Returns the transcript, or null when the audio could not be transcribed. */
  transcribe(audio: Buffer, mimeType: string): Promise<string | null>;
}

const TRANSCRIBE_PROMPT = `
You are transcribing a voice note left at a Lost & Found desk.
Write down exactly what is said, in the language it is spoken.
Respond with the transcript only. No quotes, no labels, no commentary.
If nothing intelligible is said, respond with an empty string.`;

export class GeminiTranscriber implements Transcriber {
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({ model: modelName });
  }

  async transcribe(audio: Buffer, mimeType: string): Promise<string | null> {
    try {
      const result = await this.model.generateContent([
        { inlineData: { data: audio.toString("base64"), mimeType } },
        { text: TRANSCRIBE_PROMPT },
      ]);
      const text = result.response.text().trim();
      return text || null;
    } catch (error) {
      console.error("Error transcribing audio with Gemini:", error);
      return null;
    }
  }
}
