// Ordering of /etc/*-release and /etc/*-version marker files. Alphabetical
// order is not good enough: redhat-release exists on CentOS and Oracle Linux
// too, and lsb-release is present (and least specific) almost everywhere.

const KNOWN_RELEASE_FILE =
  /(arch|centos|debian|ubuntu|fedora|redhat|suse|mandrake|mandriva|gentoo|slackware|turbolinux|unitedlinux|lsb|system|oracle|os)(-|_)(release|version)/i;

/** Moved to the front, most important last. */
const MAX_PRIORITY = ["redhat-release", "centos-release", "oracle-release"];
/** Moved to the back of the known group, least important last. */
const MIN_PRIORITY = ["lsb-release"];

function uniqueCaseInsensitiveSort(files: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const file of [...files].sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()))) {
    const key = file.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(file);
  }
  return unique;
}

export function isKnownReleaseFile(file: string): boolean {
  return KNOWN_RELEASE_FILE.test(file);
}

/** Order release marker files from most to least trustworthy. */
export function sortReleaseFiles(files: string[]): string[] {
  let primary: string[] = [];
  const secondary: string[] = [];
  for (const file of uniqueCaseInsensitiveSort(files.filter((f) => f.trim() !== ""))) {
    (isKnownReleaseFile(file) ? primary : secondary).push(file);
  }

  for (const entry of MAX_PRIORITY) {
    if (primary.includes(entry)) primary = [entry, ...primary.filter((f) => f !== entry)];
  }
  for (const entry of MIN_PRIORITY) {
    if (primary.includes(entry)) primary = [...primary.filter((f) => f !== entry), entry];
  }

  return [...primary, ...secondary];
}
