import AdmZip from "adm-zip";

export type ZipEntry = {
  entryName: string;
  isDirectory: boolean;
  getData: () => Buffer;
};

/**
 * Thin wrapper over adm-zip. Entries are read back in the order they are
 * stored, which for archives written here is sorted by name, and an entry is
 * only inflated when its `getData` is called.
 */
export class ZipArchive {
  private readonly zip: AdmZip;

  constructor(data?: Buffer) {
    this.zip = data ? new AdmZip(data) : new AdmZip();
  }

  addFile(entryName: string, data: Buffer): void {
    this.zip.addFile(entryName, data);
  }

  toBuffer(): Buffer {
    return this.zip.toBuffer();
  }

  getEntries(): ZipEntry[] {
    return this.zip.getEntries().map((entry) => ({
      entryName: entry.entryName,
      isDirectory: entry.isDirectory,
      getData: () => entry.getData(),
    }));
  }
}
