import { GoogleGenAI, type Part } from "@google/genai";
import type { ModelPart, VisionModel } from "@/types";
import { DEFAULT_MODEL, isDev } from "@/config";

// --- AI Client Initialization ---

let cachedClient: GoogleGenAI | null = null;

function getAiClient(): GoogleGenAI {
    if (cachedClient) {
        return cachedClient;
    }
    const apiKey = process.env.API_KEY;
    if (!apiKey) {
        throw new Error("AI features are unavailable. The required API key is missing from the environment (API_KEY).");
    }
    cachedClient = new GoogleGenAI({ apiKey });
    return cachedClient;
}

// --- Part Conversion ---

export const toGenerativePart = (part: ModelPart): Part =>
    'imageBase64' in part
        ? { inlineData: { data: part.imageBase64, mimeType: part.mimeType } }
        : { text: part.text };

// --- Vision Model ---

export interface GeminiModelOptions {
    model?: string;
    temperature?: number;
}

/**
 * A `VisionModel` backed by Gemini. Every call is a single `generateContent` round trip;
 * there is no retry here, failures reach the caller.
 */
export const createGeminiVisionModel = (options: GeminiModelOptions = {}): VisionModel => {
    const model = options.model ?? DEFAULT_MODEL;
    const temperature = options.temperature ?? 0.1;

    return {
        async invoke(systemPrompt: string, parts: ModelPart[]): Promise<string> {
            const label = `[AI Perf] ${model} (${parts.length} parts)`;
            if (isDev) console.time(label);

            try {
                const ai = getAiClient();
                const response = await ai.models.generateContent({
                    model,
                    contents: [{ role: 'user', parts: parts.map(toGenerativePart) }],
                    config: { systemInstruction: systemPrompt, temperature },
                });
                const text = response.text?.trim();
                if (!text) {
                    throw new Error("The AI returned an empty response.");
                }
                return text;
            } catch (error) {
                console.error("[AI Service] Model call failed:", error);
                throw error;
            } finally {
                if (isDev) console.timeEnd(label);
            }
        },
    };
};
