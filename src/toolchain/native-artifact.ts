/**
 * Toolchain-native artifact objects and the factory creating them.
 */

import { ArtifactCoordinates } from '../domain/artifact';
import {
  ArtifactFactory,
  ArtifactHandler,
  ArtifactMetadata,
  HandlerManager,
  ToolchainArtifact,
} from '../domain/toolchain';

export class NativeArtifact implements ToolchainArtifact {
  readonly groupId: string;
  readonly artifactId: string;
  readonly version: string;
  readonly type: string;
  readonly classifier?: string;
  private currentFile: string | undefined;
  private attachedMetadata: ArtifactMetadata[] = [];

  constructor(coords: ArtifactCoordinates, readonly handler: ArtifactHandler) {
    this.groupId = coords.groupId;
    this.artifactId = coords.artifactId;
    this.version = coords.version;
    this.type = coords.type;
    if (coords.classifier) this.classifier = coords.classifier;
  }

  get file(): string | undefined {
    return this.currentFile;
  }

  get metadata(): readonly ArtifactMetadata[] {
    return [...this.attachedMetadata];
  }

  setFile(file: string): void {
    this.currentFile = file;
  }

  addMetadata(metadata: ArtifactMetadata): void {
    this.attachedMetadata.push(metadata);
  }
}

export class DefaultArtifactFactory implements ArtifactFactory {
  constructor(private handlerManager: HandlerManager) {}

  createArtifactWithClassifier(
    groupId: string,
    artifactId: string,
    version: string,
    type: string,
    classifier?: string,
  ): ToolchainArtifact {
    const handler = this.handlerManager.getArtifactHandler(type);
    const effectiveClassifier = classifier ?? handler.classifier;
    return new NativeArtifact(
      { groupId, artifactId, version, type, ...(effectiveClassifier ? { classifier: effectiveClassifier } : {}) },
      handler,
    );
  }
}
