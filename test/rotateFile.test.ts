import fs from 'fs';
import os from 'os';
import path from 'path';
import { rotateFile } from '../src/utils/rotateFile';

describe('rotateFile', () => {
  let dir: string;
  const now = new Date('2024-03-10T00:00:00Z');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'edge-rotate-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should move the live file to a dated name', () => {
    fs.writeFileSync(path.join(dir, 'edge-analyzer.log'), 'line\n');

    const result = rotateFile({ dir, filename: 'edge-analyzer.log', now });

    expect(result.rotatedTo).toBe(path.join(dir, 'edge-analyzer-2024-03-10.log'));
    expect(fs.existsSync(path.join(dir, 'edge-analyzer.log'))).toBe(false);
  });

  it('should rotate at most once per day', () => {
    fs.writeFileSync(path.join(dir, 'edge-analyzer-2024-03-10.log'), 'earlier\n');
    fs.writeFileSync(path.join(dir, 'edge-analyzer.log'), 'later\n');

    const result = rotateFile({ dir, filename: 'edge-analyzer.log', now });

    expect(result.rotatedTo).toBeUndefined();
    expect(fs.readFileSync(path.join(dir, 'edge-analyzer.log'), 'utf-8')).toBe('later\n');
  });

  it('should delete rotated files past the retention period', () => {
    for (const day of ['2024-03-01', '2024-03-05']) {
      fs.writeFileSync(path.join(dir, `edge-analyzer-${day}.log`), '');
    }
    fs.writeFileSync(path.join(dir, 'other-2024-01-01.log'), '');

    const result = rotateFile({ dir, filename: 'edge-analyzer.log', retentionDays: 7, now });

    expect(result.deleted).toEqual(['edge-analyzer-2024-03-01.log']);
    expect(fs.readdirSync(dir).sort()).toEqual(['edge-analyzer-2024-03-05.log', 'other-2024-01-01.log']);
  });

  it('should do nothing for a missing directory', () => {
    expect(rotateFile({ dir: path.join(dir, 'missing'), filename: 'edge-analyzer.log', now })).toEqual({ deleted: [] });
  });
});
