import { readFile } from 'node:fs/promises';
import type { Instruction, InstructionStep } from '@/types';

export class InstructionValidationError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid instruction document:\n- ${problems.join('\n- ')}`);
        this.name = 'InstructionValidationError';
    }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

function parseStep(raw: unknown, index: number, problems: string[]): InstructionStep | null {
    const where = `steps[${index}]`;
    if (!isRecord(raw)) {
        problems.push(`${where} must be an object.`);
        return null;
    }

    const { step_number, description, expected_duration_seconds, critical } = raw;
    const before = problems.length;

    if (typeof step_number !== 'number' || !Number.isInteger(step_number) || step_number < 0) {
        problems.push(`${where}.step_number must be a non-negative integer.`);
    }
    if (typeof description !== 'string' || !description.trim()) {
        problems.push(`${where}.description must be a non-empty string.`);
    }
    if (expected_duration_seconds !== undefined && expected_duration_seconds !== null
        && (typeof expected_duration_seconds !== 'number' || !(expected_duration_seconds > 0))) {
        problems.push(`${where}.expected_duration_seconds must be a positive number when present.`);
    }
    if (critical !== undefined && typeof critical !== 'boolean') {
        problems.push(`${where}.critical must be a boolean when present.`);
    }

    if (problems.length > before || typeof step_number !== 'number' || typeof description !== 'string') {
        return null;
    }

    const step: InstructionStep = {
        stepNumber: step_number,
        description: description.trim(),
        critical: critical === true,
    };
    if (typeof expected_duration_seconds === 'number') {
        step.expectedDurationSeconds = expected_duration_seconds;
    }
    return step;
}

/**
 * Validates a parsed instruction document and maps it to the domain shape, steps sorted by
 * step number. Every problem found is reported at once.
 * @throws InstructionValidationError
 */
export function parseInstructionDocument(raw: unknown): Instruction {
    if (!isRecord(raw)) {
        throw new InstructionValidationError(['The document must be a JSON object.']);
    }

    const problems: string[] = [];
    const { title, steps } = raw;

    if (typeof title !== 'string' || !title.trim()) {
        problems.push('title must be a non-empty string.');
    }
    if (!Array.isArray(steps) || steps.length === 0) {
        problems.push('steps must be a non-empty array.');
    }

    const parsedSteps = Array.isArray(steps)
        ? steps.map((step, index) => parseStep(step, index, problems)).filter((step): step is InstructionStep => step !== null)
        : [];

    const seen = new Set<number>();
    for (const step of parsedSteps) {
        if (seen.has(step.stepNumber)) {
            problems.push(`step_number ${step.stepNumber} is used more than once.`);
        }
        seen.add(step.stepNumber);
    }

    if (problems.length > 0 || typeof title !== 'string') {
        throw new InstructionValidationError(problems);
    }

    return {
        title: title.trim(),
        steps: [...parsedSteps].sort((a, b) => a.stepNumber - b.stepNumber),
    };
}

/**
 * Reads and validates an instruction JSON file.
 */
export async function loadInstruction(filePath: string): Promise<Instruction> {
    const text = await readFile(filePath, 'utf-8');
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        console.error(`[Instructions] ${filePath} is not valid JSON:`, error);
        throw new InstructionValidationError([`${filePath} is not valid JSON.`]);
    }
    return parseInstructionDocument(raw);
}
