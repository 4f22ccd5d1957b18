// tests/unit/meta.test.ts

import { describe, it, expect } from 'vitest';
import { buildUserAgent, PROJECT_NAME, VERSION } from '../../src/meta';

describe('buildUserAgent', () => {
  const runtime = `Node.js ${process.versions.node} on ${process.platform}`;

  it('should name the project, version and runtime', () => {
    expect(buildUserAgent()).toBe(`${PROJECT_NAME}/${VERSION} (${runtime})`);
  });

  it('should append the contact', () => {
    expect(buildUserAgent('test@example.com')).toBe(`karmalens/0.1.0 (${runtime}; +test@example.com)`);
  });
});
