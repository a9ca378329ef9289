/**
 * @fileoverview Completion definitions compiled into the package.
 *
 * @module completion/bundled
 */

import cargoDefinition from '../../definitions/cargo.json';
import cdDefinition from '../../definitions/cd.json';
import chgrpDefinition from '../../definitions/chgrp.json';
import chownDefinition from '../../definitions/chown.json';
import dockerDefinition from '../../definitions/docker.json';
import gitDefinition from '../../definitions/git.json';
import ipDefinition from '../../definitions/ip.json';
import killDefinition from '../../definitions/kill.json';
import lsDefinition from '../../definitions/ls.json';
import makeDefinition from '../../definitions/make.json';
import npmDefinition from '../../definitions/npm.json';
import sshDefinition from '../../definitions/ssh.json';
import sudoDefinition from '../../definitions/sudo.json';
import systemctlDefinition from '../../definitions/systemctl.json';
import tarDefinition from '../../definitions/tar.json';

/** A definition document and the name it is reported under */
export interface DefinitionSource {
  source: string;
  document: unknown;
}

export const BUNDLED_DEFINITIONS: readonly DefinitionSource[] = [
  { source: 'bundled:cargo.json', document: cargoDefinition },
  { source: 'bundled:cd.json', document: cdDefinition },
  { source: 'bundled:chgrp.json', document: chgrpDefinition },
  { source: 'bundled:chown.json', document: chownDefinition },
  { source: 'bundled:docker.json', document: dockerDefinition },
  { source: 'bundled:git.json', document: gitDefinition },
  { source: 'bundled:ip.json', document: ipDefinition },
  { source: 'bundled:kill.json', document: killDefinition },
  { source: 'bundled:ls.json', document: lsDefinition },
  { source: 'bundled:make.json', document: makeDefinition },
  { source: 'bundled:npm.json', document: npmDefinition },
  { source: 'bundled:ssh.json', document: sshDefinition },
  { source: 'bundled:sudo.json', document: sudoDefinition },
  { source: 'bundled:systemctl.json', document: systemctlDefinition },
  { source: 'bundled:tar.json', document: tarDefinition },
];
