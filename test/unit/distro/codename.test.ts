import { debianCodename, releaseCodename, susePatchLevel, ubuntuCodename } from '../../../src/distro/codename.js';

describe('ubuntuCodename', () => {
  it('looks up April and October releases', () => {
    expect(ubuntuCodename('20', '04')).toBe('focal');
    expect(ubuntuCodename('14', '10')).toBe('utopic');
  });

  it('treats other minors as the April release', () => {
    expect(ubuntuCodename('16', '03')).toBe('xenial');
  });

  it('returns null for unknown or unversioned releases', () => {
    expect(ubuntuCodename('30', '04')).toBeNull();
    expect(ubuntuCodename(null, null)).toBeNull();
  });
});

describe('debianCodename', () => {
  it('ignores zero padding', () => {
    expect(debianCodename('09')).toBe('stretch');
    expect(debianCodename('12')).toBe('bookworm');
  });
});

describe('releaseCodename', () => {
  it('only knows apt distros', () => {
    expect(releaseCodename('debian', '11', null)).toBe('bullseye');
    expect(releaseCodename('centos', '7', null)).toBeNull();
  });
});

describe('susePatchLevel', () => {
  it('reads PATCHLEVEL', () => {
    expect(susePatchLevel('SUSE Linux Enterprise Server 11 (x86_64)\nVERSION = 11\nPATCHLEVEL = 3\n')).toBe('3');
  });

  it('defaults to 00', () => {
    expect(susePatchLevel(null)).toBe('00');
    expect(susePatchLevel('VERSION = 12\n')).toBe('00');
  });
});
