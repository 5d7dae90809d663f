import type { ReleaseProfile } from './types';

export const DESCRIPTOR_FILENAME = 'Info.plist';

export type DescriptorFields = {
  appName: string;
  bundleIdentifier: string;
  version: string;
  executableName: string;
  iconFile: string;
  minimumSystemVersion: string;
};

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

export function descriptorFieldsFor(profile: ReleaseProfile, version: string): DescriptorFields {
  return {
    appName: profile.appName,
    bundleIdentifier: profile.bundleIdentifier,
    version,
    executableName: profile.binaryName,
    iconFile: profile.iconName,
    minimumSystemVersion: profile.minimumSystemVersion
  };
}

/**
 * Renders Info.plist. Key names, order and layout are fixed; the icon key is written even when
 * the bundle ships without an icon container.
 */
export function renderDescriptor(fields: DescriptorFields): string {
  const entry = (key: string, value: string) => `  <key>${key}</key><string>${escapeXml(value)}</string>`;
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
    '<plist version="1.0"><dict>',
    entry('CFBundleName', fields.appName),
    entry('CFBundleIdentifier', fields.bundleIdentifier),
    entry('CFBundleVersion', fields.version),
    entry('CFBundleShortVersionString', fields.version),
    entry('CFBundleExecutable', fields.executableName),
    entry('CFBundleIconFile', fields.iconFile),
    entry('LSMinimumSystemVersion', fields.minimumSystemVersion),
    '</dict></plist>',
    ''
  ].join('\n');
}
