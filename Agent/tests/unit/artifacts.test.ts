import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@mender/shared/Utils/logger.js', () => ({
  Logger: class { info = vi.fn(); warn = vi.fn(); error = vi.fn(); debug = vi.fn(); },
}));

const mockGenerateImage = vi.fn();
vi.mock('ai', () => ({
  experimental_generateImage: (...args: unknown[]) => mockGenerateImage(...args),
}));

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ImageModel } from 'ai';
import type { Episode } from '../../src/core/types.js';
import { saveSolution, solutionPath } from '../../src/output/solution-writer.js';
import { ImageThoughtRenderer, buildImagePrompt, imagePath } from '../../src/visualizer/image-renderer.js';

let dir: string;

beforeEach(async () => {
  vi.clearAllMocks();
  dir = await mkdtemp(join(tmpdir(), 'mender-artifacts-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function episode(overrides: Partial<Episode> = {}): Episode {
  return {
    id: 'ep_abc',
    task: { statement: 'Print 1', language: 'node' },
    triples: [],
    status: 'SUCCEEDED',
    startedAt: '2025-03-01T10:00:00.000Z',
    finalCode: 'console.log(1);',
    ...overrides,
  };
}

describe('saveSolution', () => {
  it('writes the final code with the language extension', async () => {
    const path = await saveSolution(join(dir, 'out'), episode());

    expect(path).toBe(join(dir, 'out', 'solution-ep_abc.mjs'));
    expect(await readFile(join(dir, 'out', 'solution-ep_abc.mjs'), 'utf-8')).toBe('console.log(1);\n');
  });

  it('does nothing without final code', async () => {
    expect(await saveSolution(dir, episode({ status: 'FAILED', finalCode: undefined }))).toBeNull();
  });

  it('names files per language', () => {
    expect(solutionPath('/s', { id: 'ep_1', task: { statement: 'x', language: 'bash' } })).toBe('/s/solution-ep_1.sh');
    expect(solutionPath('/s', { id: 'ep_1', task: { statement: 'x', language: 'python' } })).toBe('/s/solution-ep_1.py');
  });
});

describe('ImageThoughtRenderer', () => {
  const model: ImageModel = {
    specificationVersion: 'v1',
    provider: 'test',
    modelId: 'test-image',
    maxImagesPerCall: 1,
    doGenerate: vi.fn(),
  };

  it('collapses whitespace in the prompt and caps the thought', () => {
    expect(buildImagePrompt('  split\n\tthe   input ')).toContain('representing the idea: "split the input".');
    expect(buildImagePrompt('x'.repeat(2000))).toContain(`"${'x'.repeat(800)}"`);
  });

  it('numbers images from one', () => {
    expect(imagePath('/img', { episodeId: 'ep_abc', iteration: 0 })).toBe('/img/ep_abc-attempt-1.png');
  });

  it('writes the generated image and returns its path', async () => {
    mockGenerateImage.mockResolvedValue({ image: { uint8Array: new Uint8Array([137, 80, 78, 71]) } });
    const renderer = new ImageThoughtRenderer({ model, outputDir: dir });

    const path = await renderer.render('loop twice', { episodeId: 'ep_abc', iteration: 2 });

    expect(path).toBe(join(dir, 'ep_abc-attempt-3.png'));
    expect([...(await readFile(join(dir, 'ep_abc-attempt-3.png')))]).toEqual([137, 80, 78, 71]);
    expect(mockGenerateImage).toHaveBeenCalledWith(expect.objectContaining({ model, size: '1024x1024' }));
  });

  it('returns null when the image model fails', async () => {
    mockGenerateImage.mockRejectedValue(new Error('content policy'));
    const renderer = new ImageThoughtRenderer({ model, outputDir: dir });

    expect(await renderer.render('anything', { episodeId: 'ep_abc', iteration: 0 })).toBeNull();
  });
});
