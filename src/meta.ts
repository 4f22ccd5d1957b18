// src/meta.ts

export const PROJECT_NAME = 'karmalens';
export const VERSION = '0.1.0';

/**
 * Identification string sent with every request. The upstream API throttles
 * or blocks generic agents, so it names the client, its version and a contact.
 */
export function buildUserAgent(contact?: string): string {
  const runtime = `Node.js ${process.versions.node} on ${process.platform}`;
  const suffix = contact ? `; +${contact}` : '';
  return `${PROJECT_NAME}/${VERSION} (${runtime}${suffix})`;
}
