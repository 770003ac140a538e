import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createGeminiVisionModel, toGenerativePart } from './geminiService';

const mocks = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent: mocks.generateContent };
  },
}));

beforeEach(() => {
  mocks.generateContent.mockReset();
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'time').mockImplementation(() => {});
  vi.spyOn(console, 'timeEnd').mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('toGenerativePart', () => {
  it('maps text and image parts', () => {
    expect(toGenerativePart({ text: 'hello' })).toEqual({ text: 'hello' });
    expect(toGenerativePart({ imageBase64: 'abc', mimeType: 'image/png' }))
      .toEqual({ inlineData: { data: 'abc', mimeType: 'image/png' } });
  });
});

describe('createGeminiVisionModel', () => {
  // The client is cached after the first successful call, so the missing-key case runs first.
  it('fails without an API key', async () => {
    vi.stubEnv('API_KEY', '');
    const model = createGeminiVisionModel({ model: 'test-model' });

    await expect(model.invoke('system', [{ text: 'hi' }])).rejects.toThrow('API_KEY');
    expect(mocks.generateContent).not.toHaveBeenCalled();
  });

  it('sends one request and trims the reply', async () => {
    vi.stubEnv('API_KEY', 'test-secret');
    mocks.generateContent.mockResolvedValue({ text: '  mixing the mortar \n' });
    const model = createGeminiVisionModel({ model: 'test-model' });

    const reply = await model.invoke('system', [{ text: 'hi' }, { imageBase64: 'abc', mimeType: 'image/jpeg' }]);

    expect(reply).toBe('mixing the mortar');
    expect(mocks.generateContent).toHaveBeenCalledWith({
      model: 'test-model',
      contents: [{ role: 'user', parts: [{ text: 'hi' }, { inlineData: { data: 'abc', mimeType: 'image/jpeg' } }] }],
      config: { systemInstruction: 'system', temperature: 0.1 },
    });
  });

  it('treats an empty reply as a failure', async () => {
    vi.stubEnv('API_KEY', 'test-secret');
    mocks.generateContent.mockResolvedValue({ text: '   ' });

    await expect(createGeminiVisionModel().invoke('system', [{ text: 'hi' }]))
      .rejects.toThrow('The AI returned an empty response.');
    expect(console.error).toHaveBeenCalled();
  });
});
