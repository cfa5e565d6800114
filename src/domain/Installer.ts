/**
 * macOS installer applications and the releases we know how to label.
 */

export interface MacOSRelease {
  /** Display name, e.g. "macOS Sonoma" */
  readonly name: string
  /** Substring that identifies the release in an installer bundle name */
  readonly keyword: string
  /** Label of the partition that receives this release */
  readonly volumeName: string
}

// Newest first: discovery and partitions follow this order.
export const MACOS_RELEASES: ReadonlyArray<MacOSRelease> = [
  { name: "macOS Tahoe", keyword: "Tahoe", volumeName: "INSTALL_TAHOE" },
  { name: "macOS Sequoia", keyword: "Sequoia", volumeName: "INSTALL_SEQUOIA" },
  { name: "macOS Sonoma", keyword: "Sonoma", volumeName: "INSTALL_SONOMA" },
  { name: "macOS Ventura", keyword: "Ventura", volumeName: "INSTALL_VENTURA" },
  { name: "macOS Monterey", keyword: "Monterey", volumeName: "INSTALL_MONTEREY" },
  { name: "macOS Big Sur", keyword: "Big Sur", volumeName: "INSTALL_BIGSUR" },
  { name: "macOS Catalina", keyword: "Catalina", volumeName: "INSTALL_CATALINA" },
  { name: "macOS Mojave", keyword: "Mojave", volumeName: "INSTALL_MOJAVE" },
  { name: "macOS High Sierra", keyword: "High Sierra", volumeName: "INSTALL_HIGHSIERRA" },
  { name: "macOS Sierra", keyword: "macOS Sierra", volumeName: "INSTALL_SIERRA" },
  { name: "OS X El Capitan", keyword: "El Capitan", volumeName: "INSTALL_ELCAPITAN" },
]

export interface InstallerRecord {
  readonly applicationPath: string
  readonly displayName: string
  readonly releaseName: string
  readonly version?: string
  readonly build?: string
  readonly volumeName: string
  readonly sizeBytes: number
}

export const matchesRelease = (fileName: string, release: MacOSRelease): boolean =>
  fileName.endsWith(".app") && fileName.includes("Install") && fileName.includes(release.keyword)

export const minimumPartitionBytes = (installer: InstallerRecord, marginBytes: number): number =>
  installer.sizeBytes + marginBytes

const GENERIC_WORDS = new Set(["os", "x", "macos", "install"])

/**
 * Words of a release name that can identify its volume once
 * createinstallmedia has renamed it ("Install macOS Sonoma" → ["sonoma"]).
 */
export const releaseKeywords = (releaseName: string): string[] =>
  releaseName
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0 && !GENERIC_WORDS.has(word))

export const describeInstaller = (installer: InstallerRecord): string =>
  installer.version ? `${installer.releaseName} (${installer.version})` : installer.releaseName
