import type { Partition } from './input.js';
import type { InstallerInfo, InstallerType } from './types.js';

const KNOWN_INSTALLERS: Readonly<Record<string, InstallerType>> = {
  'com.android.vending': 'PLAY_STORE',
  'com.google.android.packageinstaller': 'SYSTEM_INSTALLER',
  'com.android.packageinstaller': 'SYSTEM_INSTALLER',
  'com.samsung.android.scloud': 'SAMSUNG_STORE',
  'com.sec.android.app.samsungapps': 'SAMSUNG_STORE',
  'com.huawei.appmarket': 'HUAWEI_APPGALLERY',
  'com.amazon.venezia': 'AMAZON_APPSTORE',
};

const EXPECTED_INSTALLER_TYPES: ReadonlySet<InstallerType> = new Set<InstallerType>([
  'PLAY_STORE',
  'SYSTEM_INSTALLER',
  'SAMSUNG_STORE',
  'HUAWEI_APPGALLERY',
  'AMAZON_APPSTORE',
  'MDM_INSTALLER',
]);

export function classifyInstaller(installerPackage: string | null): InstallerType {
  if (installerPackage === null || installerPackage === '') return 'UNKNOWN';
  const known = KNOWN_INSTALLERS[installerPackage];
  if (known !== undefined) return known;
  const lower = installerPackage.toLowerCase();
  if (lower.includes('mdm') || lower.includes('enterprise')) return 'MDM_INSTALLER';
  return 'SIDELOADED';
}

export function isExpectedInstallerType(type: InstallerType): boolean {
  return EXPECTED_INSTALLER_TYPES.has(type);
}

export function checkInstaller(installerPackage: string | null): InstallerInfo {
  const installerType = classifyInstaller(installerPackage);
  return {
    installerPackage,
    installerType,
    isExpectedInstaller: isExpectedInstallerType(installerType),
  };
}

export function partitionFromPath(apkPath: string | null): Partition {
  if (apkPath === null) return 'UNKNOWN';
  if (apkPath.startsWith('/system/')) return 'SYSTEM';
  if (apkPath.startsWith('/vendor/')) return 'VENDOR';
  if (apkPath.startsWith('/product/')) return 'PRODUCT';
  if (apkPath.startsWith('/data/')) return 'DATA';
  return 'UNKNOWN';
}

export function installerLabel(type: InstallerType): string {
  switch (type) {
    case 'PLAY_STORE':
      return 'Google Play';
    case 'SYSTEM_INSTALLER':
      return 'the system installer';
    case 'SAMSUNG_STORE':
      return 'Galaxy Store';
    case 'HUAWEI_APPGALLERY':
      return 'AppGallery';
    case 'AMAZON_APPSTORE':
      return 'Amazon Appstore';
    case 'MDM_INSTALLER':
      return 'device management';
    case 'SIDELOADED':
      return 'a sideload source';
    case 'UNKNOWN':
      return 'an unknown source';
  }
}
