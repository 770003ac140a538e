import { vi } from 'vitest';
import type { DetectedAction, Frame, Instruction, ModelPart, VisionModel } from '@/types';

let nextId = 0;

export function makeAction(
  timestampStart: number,
  timestampEnd: number,
  description: string,
  overrides: Partial<DetectedAction> = {}
): DetectedAction {
  nextId += 1;
  return { id: `action-${nextId}`, description, timestampStart, timestampEnd, confidence: 0.8, ...overrides };
}

export function makeInstruction(descriptions: string[], title = 'Block casting'): Instruction {
  return {
    title,
    steps: descriptions.map((description, index) => ({ stepNumber: index + 1, description, critical: false })),
  };
}

export function makeFrame(timestamp: number): Frame {
  return { timestamp, imageBase64: Buffer.from(`frame-${timestamp}`).toString('base64'), mimeType: 'image/jpeg' };
}

/**
 * A VisionModel that answers by system prompt. Each prompt has a queue of replies; the last
 * reply repeats once the queue runs dry.
 */
export function createScriptedModel(script: Record<string, string[]>) {
  const queues = new Map(Object.entries(script).map(([prompt, replies]) => [prompt, [...replies]]));

  const invoke = vi.fn(async (systemPrompt: string, _parts: ModelPart[]): Promise<string> => {
    const queue = queues.get(systemPrompt);
    if (!queue || queue.length === 0) {
      throw new Error(`No scripted reply for system prompt: ${systemPrompt}`);
    }
    return queue.length > 1 ? queue.shift() ?? '' : queue[0];
  });

  const model: VisionModel = { invoke };
  return { model, invoke };
}
