import type { InstallerType, Partition } from '../evidence/index.js';
import type { InstallClass, PolicyProfile } from './types.js';

export function classifyInstall(
  isSystemApp: boolean,
  installerType: InstallerType,
  partition: Partition,
): InstallClass {
  if (isSystemApp && (partition === 'SYSTEM' || partition === 'VENDOR' || partition === 'PRODUCT')) {
    return 'SYSTEM_PREINSTALLED';
  }
  if (installerType === 'MDM_INSTALLER') return 'ENTERPRISE_MANAGED';
  return 'USER_INSTALLED';
}

export function profileFor(installClass: InstallClass): PolicyProfile {
  switch (installClass) {
    case 'SYSTEM_PREINSTALLED':
    case 'ENTERPRISE_MANAGED':
      return 'SYSTEM';
    case 'USER_INSTALLED':
      return 'USER';
  }
}

/** Minimum weighted finding sum for an INFO verdict under each profile. */
export const INFO_THRESHOLD: Readonly<Record<PolicyProfile, number>> = {
  SYSTEM: 5,
  USER: 1,
};
