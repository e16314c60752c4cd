import { copyFileSync } from 'node:fs';
import { saveInstallMetadata } from '../artifacts/metadata.js';
import { fileExists } from '../artifacts/predicates.js';
import type { Bridge } from '../steps/types.js';

/** Remember which release built this cluster so `cleanup` can find its binaries */
export const saveInstallMetadataBridge: Bridge = {
  name: 'save install metadata',
  run(ctx) {
    const path = saveInstallMetadata(ctx.store.clusterDir(ctx.config.clusterName), ctx.config.releaseImage);
    ctx.log.debug(`Saved installation metadata to ${path}`);
  },
};

/** `create manifests` consumes install-config.yaml; keep a copy for region lookup and audit */
export const backupInstallConfigBridge: Bridge = {
  name: 'back up install-config.yaml',
  run(ctx) {
    const source = ctx.store.installConfig(ctx.config.clusterName);
    if (!fileExists(source)) return;
    const backup = ctx.store.installConfigBackup(ctx.config.clusterName);
    copyFileSync(source, backup);
    ctx.log.debug(`Backed up install-config.yaml to ${backup}`);
  },
};
