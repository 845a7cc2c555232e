/**
 * Standard artifact handlers.
 *
 * Maps packaging types to the extension and classifier the repository
 * layout uses. Unknown types fall back to a handler whose extension is the
 * type itself.
 */

import { ArtifactHandler, HandlerManager } from '../domain/toolchain';

function handler(type: string, extension: string, classifier?: string): ArtifactHandler {
  return { type, extension, packaging: type, ...(classifier ? { classifier } : {}) };
}

export const STANDARD_HANDLERS: readonly ArtifactHandler[] = [
  handler('jar', 'jar'),
  handler('war', 'war'),
  handler('ear', 'ear'),
  handler('ejb', 'jar'),
  handler('ejb-client', 'jar', 'client'),
  handler('pom', 'pom'),
  handler('maven-plugin', 'jar'),
  handler('test-jar', 'jar', 'tests'),
  handler('java-source', 'jar', 'sources'),
  handler('javadoc', 'jar', 'javadoc'),
];

export class DefaultHandlerManager implements HandlerManager {
  private handlers = new Map<string, ArtifactHandler>();

  constructor(handlers: readonly ArtifactHandler[] = STANDARD_HANDLERS) {
    for (const h of handlers) this.handlers.set(h.type, { ...h });
  }

  getArtifactHandler(type: string): ArtifactHandler {
    const found = this.handlers.get(type);
    return found ? { ...found } : handler(type, type);
  }

  addHandlers(handlers: Record<string, ArtifactHandler>): void {
    for (const [type, h] of Object.entries(handlers)) {
      this.handlers.set(type, { ...h });
    }
  }
}
