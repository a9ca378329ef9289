/**
 * @fileoverview shellcomp version information.
 *
 * @module version
 */

/** shellcomp version number */
export const VERSION = '0.3.0';

/** Full version string */
export const VERSION_STRING = `shellcomp v${VERSION}`;
