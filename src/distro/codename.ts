/** Ubuntu release codenames by `major.minor`. */
const UBUNTU_CODENAMES: Readonly<Record<string, string>> = {
  "12.04": "precise",
  "12.10": "quantal",
  "13.04": "raring",
  "13.10": "saucy",
  "14.04": "trusty",
  "14.10": "utopic",
  "15.04": "vivid",
  "15.10": "wily",
  "16.04": "xenial",
  "16.10": "yakkety",
  "17.04": "zesty",
  "17.10": "artful",
  "18.04": "bionic",
  "18.10": "cosmic",
  "19.04": "disco",
  "19.10": "eoan",
  "20.04": "focal",
  "20.10": "groovy",
  "21.04": "hirsute",
  "21.10": "impish",
  "22.04": "jammy",
  "22.10": "kinetic",
  "23.04": "lunar",
  "23.10": "mantic",
  "24.04": "noble",
  "24.10": "oracular",
};

/**
 * Ubuntu codename for a major/minor pair. A minor other than 04 or 10 is
 * treated as the April release of that year; an unknown year has no codename.
 */
export function ubuntuCodename(major: string | null, minor: string | null): string | null {
  if (major === null) return null;
  const month = minor === "10" ? "10" : "04";
  return UBUNTU_CODENAMES[`${major}.${month}`] ?? null;
}

const DEBIAN_CODENAMES: Readonly<Record<string, string>> = {
  "6": "squeeze",
  "7": "wheezy",
  "8": "jessie",
  "9": "stretch",
  "10": "buster",
  "11": "bullseye",
  "12": "bookworm",
  "13": "trixie",
};

export function debianCodename(major: string | null): string | null {
  return major === null ? null : (DEBIAN_CODENAMES[String(Number(major))] ?? null);
}

/** Release codename for the distros whose repositories are keyed by one. */
export function releaseCodename(distro: string, major: string | null, minor: string | null): string | null {
  switch (distro) {
    case "ubuntu":
      return ubuntuCodename(major, minor);
    case "debian":
      return debianCodename(major);
    default:
      return null;
  }
}

/** SUSE service pack level from /etc/SuSE-release; "00" when absent. */
export function susePatchLevel(suseRelease: string | null): string {
  const match = suseRelease ? /^PATCHLEVEL\s*=\s*([0-9]+)/m.exec(suseRelease) : null;
  return match?.[1] ?? "00";
}
