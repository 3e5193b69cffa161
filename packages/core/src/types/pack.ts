/**
 * Package Types
 */

/**
 * Summary of one input package. Created once by the loader and never mutated.
 */
export interface PackInfo {
  /** Root directory of the package tree */
  readonly path: string;
  /** Label and ordering key */
  readonly name: string;
  readonly declaredFormat?: number;
  readonly description?: string;
  readonly hasIcon: boolean;
}

export type PackSource = 'directory' | 'archive';

/**
 * A package located by discovery, before its descriptor is loaded
 */
export interface DiscoveredPackage {
  path: string;
  name: string;
  source: PackSource;
  /** Archive the package was expanded from */
  archivePath?: string;
}

/**
 * Descriptor written to and read from `pack.mcmeta`
 */
export type PackDescriptor = {
  pack: {
    pack_format: number;
    description: string;
  };
};

export const DESCRIPTOR_FILE = 'pack.mcmeta';
export const ICON_FILE = 'pack.png';
export const NAMESPACE_ROOTS = ['assets', 'data'] as const;

export type NamespaceRoot = (typeof NAMESPACE_ROOTS)[number];
