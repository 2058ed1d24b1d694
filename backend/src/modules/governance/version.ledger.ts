/**
 * REPORT GOVERNANCE — VERSION LEDGER
 *
 * Append-only. Exactly one entry is current once the ledger is non-empty,
 * and the pointer fields mirror that entry.
 */

import { v4 as uuid } from 'uuid';
import { VersionConsistencyError } from './governance.errors.js';
import type { ChangeType, SemVer, Version, VersionLedger } from './governance.types.js';

export const INITIAL_VERSION: SemVer = { major: 1, minor: 0, patch: 0 };

export function formatVersion(v: SemVer): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

export function createLedger(): VersionLedger {
  return {
    versions: [],
    currentVersion: null,
    currentMajor: null,
    currentMinor: null,
    currentPatch: null,
  };
}

export function currentVersionOf(ledger: VersionLedger): Version | null {
  return ledger.versions.find((v) => v.current) ?? null;
}

export function hasVersion(ledger: VersionLedger, versionNumber: string): boolean {
  return ledger.versions.some((v) => v.versionNumber === versionNumber);
}

/**
 * Bump arithmetic. No current version means the first one: 1.0.0.
 */
export function nextVersion(current: SemVer | null, changeType: ChangeType): SemVer {
  if (!current) return INITIAL_VERSION;

  switch (changeType) {
    case 'MAJOR':
      return { major: current.major + 1, minor: 0, patch: 0 };
    case 'MINOR':
    case 'ENHANCEMENT':
      return { major: current.major, minor: current.minor + 1, patch: 0 };
    case 'PATCH':
    case 'HOTFIX':
    case 'REFACTOR':
      return { major: current.major, minor: current.minor, patch: current.patch + 1 };
  }
}

export interface NewVersion extends SemVer {
  changeType: ChangeType;
  description: string;
  createdAt: string;
  createdBy: string;
  stable?: boolean;
}

/**
 * Clears every current flag, appends `input` as current and moves the
 * pointer, all in the returned ledger.
 */
export function addVersion(ledger: VersionLedger, input: NewVersion): { ledger: VersionLedger; version: Version } {
  const version: Version = {
    versionId: uuid(),
    major: input.major,
    minor: input.minor,
    patch: input.patch,
    versionNumber: formatVersion(input),
    changeType: input.changeType,
    description: input.description,
    createdAt: input.createdAt,
    createdBy: input.createdBy,
    current: true,
    stable: input.stable ?? true,
  };

  return {
    ledger: {
      versions: [...ledger.versions.map((v) => (v.current ? { ...v, current: false } : v)), version],
      currentVersion: version.versionNumber,
      currentMajor: version.major,
      currentMinor: version.minor,
      currentPatch: version.patch,
    },
    version,
  };
}

export function assertConsistent(ledger: VersionLedger): void {
  const current = ledger.versions.filter((v) => v.current);

  if (ledger.versions.length === 0) {
    if (ledger.currentVersion !== null) {
      throw new VersionConsistencyError('pointer set on an empty ledger', { currentVersion: ledger.currentVersion });
    }
    return;
  }
  if (current.length !== 1) {
    throw new VersionConsistencyError(`${current.length} current versions`, {
      current: current.map((v) => v.versionNumber),
    });
  }

  const [only] = current;
  if (
    ledger.currentVersion !== only.versionNumber ||
    ledger.currentMajor !== only.major ||
    ledger.currentMinor !== only.minor ||
    ledger.currentPatch !== only.patch
  ) {
    throw new VersionConsistencyError('pointer disagrees with current entry', {
      pointer: ledger.currentVersion,
      current: only.versionNumber,
    });
  }
}
