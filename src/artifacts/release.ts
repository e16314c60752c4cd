import { InstallerError, ErrorCode } from '../lib/errors.js';

const VERSION_ARCH_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Derive the version/architecture key from a release image reference.
 *
 * The key is the image tag: `quay.io/openshift-release-dev/ocp-release:4.12.0-x86_64`
 * yields `4.12.0-x86_64`. It becomes a directory segment under `shared/`, so
 * digests, untagged references and anything resembling a path are rejected.
 */
export function extractVersionArch(releaseImage: string): string {
  const image = releaseImage.trim();
  if (!image) {
    throw new InstallerError(ErrorCode.RELEASE_IMAGE_INVALID, 'release image is empty');
  }

  if (image.includes('@')) {
    throw new InstallerError(
      ErrorCode.RELEASE_IMAGE_INVALID,
      `release image "${image}" is pinned by digest; a version tag is required`,
      'Example: quay.io/openshift-release-dev/ocp-release:4.12.0-x86_64',
    );
  }

  // A colon before the last slash belongs to the registry host:port
  const lastSlash = image.lastIndexOf('/');
  const lastColon = image.lastIndexOf(':');
  if (lastColon <= lastSlash) {
    throw new InstallerError(
      ErrorCode.RELEASE_IMAGE_INVALID,
      `release image "${image}" has no version tag`,
      'Example: quay.io/openshift-release-dev/ocp-release:4.12.0-x86_64',
    );
  }

  const tag = image.slice(lastColon + 1);
  if (!VERSION_ARCH_PATTERN.test(tag) || tag.includes('..')) {
    throw new InstallerError(
      ErrorCode.RELEASE_IMAGE_INVALID,
      `release image tag "${tag}" cannot be used as a version/architecture key`,
    );
  }

  return tag;
}

/** Like extractVersionArch but returns null instead of throwing */
export function tryExtractVersionArch(releaseImage: string): string | null {
  try {
    return extractVersionArch(releaseImage);
  } catch {
    return null;
  }
}
