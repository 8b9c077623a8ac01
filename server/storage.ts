import { promises as fs } from 'fs';
import { requestFileSchema } from "@shared/schema";
import { MalformedInputError, MissingFileError, getErrorMessage } from "./errors";
import { log } from "./log";

export interface IRequestStorage {
  load(): Promise<void>;
  getUrls(): string[];
  addUrl(url: string): Promise<boolean>;
  removeUrl(url: string): Promise<boolean>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * URL list kept in a JSON file of the form { "urls": [...] }.
 * Order is insertion order; every change is written back immediately.
 */
export class RequestQueue implements IRequestStorage {
  private urls: string[] = [];

  constructor(private readonly filePath: string) {}

  static async open(filePath: string): Promise<RequestQueue> {
    const queue = new RequestQueue(filePath);
    await queue.load();
    return queue;
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new MissingFileError(this.filePath);
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new MalformedInputError(`Request file ${this.filePath} is not valid JSON: ${getErrorMessage(error)}`);
    }

    const parsed = requestFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedInputError("JSON file must contain a 'urls' key with a list of URLs");
    }

    this.urls = parsed.data.urls;
  }

  getUrls(): string[] {
    return [...this.urls];
  }

  /**
   * Appends the url unless it is already queued. Returns whether the list changed.
   */
  async addUrl(url: string): Promise<boolean> {
    if (this.urls.includes(url)) return false;

    this.urls.push(url);
    await this.save();
    log(`Added ${url}`, 'QUEUE');
    return true;
  }

  async removeUrl(url: string): Promise<boolean> {
    if (!this.urls.includes(url)) return false;

    this.urls = this.urls.filter(u => u !== url);
    await this.save();
    log(`Removed ${url}`, 'QUEUE');
    return true;
  }

  private async save(): Promise<void> {
    const data = { urls: this.urls };
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 4) + '\n', 'utf8');
  }
}
