import { fileExists, join } from '@cartwright/shared';
import { CARTHAGE_FILE, CARTHAGE_FILE_RESOLVED } from './constants';

export interface ManifestPresence {
  hasCartfile: boolean;
  hasResolvedCartfile: boolean;
}

export async function hasCartfile(projectRoot: string): Promise<boolean> {
  return fileExists(join(projectRoot, CARTHAGE_FILE));
}

export async function checkManifests(projectRoot: string): Promise<ManifestPresence> {
  const [cartfile, resolved] = await Promise.all([
    hasCartfile(projectRoot),
    fileExists(join(projectRoot, CARTHAGE_FILE_RESOLVED)),
  ]);
  return { hasCartfile: cartfile, hasResolvedCartfile: resolved };
}
