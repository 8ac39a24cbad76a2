import { describe, it, expect } from 'vitest';
import { parseModelResponse } from '../../src/llm/response-parser.js';

describe('parseModelResponse', () => {
  it('splits thinking and a tagged code block', () => {
    const text = '<thinking>\nAdd the numbers.\n</thinking>\n\n```python\nprint(19 + 23)\n```\n';
    expect(parseModelResponse(text, 'python')).toEqual({ rationale: 'Add the numbers.', code: 'print(19 + 23)' });
  });

  it('prefers the block tagged with the task language', () => {
    const text = 'Example input:\n```text\n1 2\n```\nSolution:\n```py\nprint(3)\n```';
    expect(parseModelResponse(text, 'python').code).toBe('print(3)');
  });

  it('ignores code quoted inside the thinking block', () => {
    const text = '<thinking>The old ```python\nprint(x)\n``` failed.</thinking>\n```python\nx = 1\nprint(x)\n```';
    expect(parseModelResponse(text, 'python').code).toBe('x = 1\nprint(x)');
  });

  it('falls back to any fenced block', () => {
    const text = '```\necho hi\n```';
    expect(parseModelResponse(text, 'bash')).toEqual({ rationale: '', code: 'echo hi' });
  });

  it('recovers code from an unterminated fence', () => {
    const text = '<thinking>ok</thinking>\n```javascript\nconsole.log(1);\n';
    expect(parseModelResponse(text, 'node').code).toBe('console.log(1);');
  });

  it('uses the text after </thinking> when there is no fence', () => {
    const text = '<thinking>simple</thinking>\nprint("hi")\n';
    expect(parseModelResponse(text, 'python')).toEqual({ rationale: 'simple', code: 'print("hi")' });
  });

  it('takes prose before the first fence as rationale when there is no thinking block', () => {
    const text = 'Loop over the range.\n```python\nfor i in range(3): print(i)\n```';
    expect(parseModelResponse(text, 'python').rationale).toBe('Loop over the range.');
  });
});
