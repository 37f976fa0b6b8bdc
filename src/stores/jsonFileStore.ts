import fs from "fs";
import path from "path";

// Record ids become file names, so only plain id characters are allowed
const SAFE_ID = /^[A-Za-z0-9_-]+$/;

/**
 * JsonFileStore keeps one JSON file per record in a directory.
 * The directory is created on construction.
 */
export class JsonFileStore<T extends { id: string }> {
  protected readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  private filePath(id: string): string {
    return path.join(this.dir, `${id}.json`);
  }

  /**
   * Save a record to disk, replacing any earlier version
   */
  save(record: T): void {
    if (!SAFE_ID.test(record.id)) {
      throw new Error(`Invalid record id: ${record.id}`);
    }
    fs.writeFileSync(this.filePath(record.id), JSON.stringify(record, null, 2));
  }

  /**
   * Load a record by ID
   */
  load(id: string): T | null {
    if (!SAFE_ID.test(id)) {
      return null;
    }
    const filePath = this.filePath(id);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const data = fs.readFileSync(filePath, "utf-8");
    const record: T = JSON.parse(data);
    return record;
  }

  delete(id: string): boolean {
    if (!SAFE_ID.test(id)) {
      return false;
    }
    const filePath = this.filePath(id);
    if (!fs.existsSync(filePath)) {
      return false;
    }
    fs.unlinkSync(filePath);
    return true;
  }

  /**
   * Get all records. Unreadable files are skipped with a warning.
   */
  getAll(): T[] {
    if (!fs.existsSync(this.dir)) {
      return [];
    }

    const files = fs.readdirSync(this.dir).filter(f => f.endsWith(".json"));
    const records: T[] = [];

    for (const file of files) {
      try {
        const data = fs.readFileSync(path.join(this.dir, file), "utf-8");
        const record: T = JSON.parse(data);
        records.push(record);
      } catch (error) {
        console.warn(`Skipping unreadable record ${file}:`, error);
      }
    }

    return records;
  }
}
