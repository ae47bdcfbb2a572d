/**
 * All webs under the store root
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { WebStub } from "../types";
import { createLogger } from "../logging";
import { isSafePathSegment } from "../utils/path-safety";
import { WebError, fromFsError } from "./errors";
import { isDirectory, listSubdirectories } from "./fs-utils";
import { Web } from "./web";

const log = createLogger("webs");

export class WebCollection {
  constructor(readonly root: string) {}

  private pathFor(name: string): string {
    if (!isSafePathSegment(name)) {
      throw new WebError("InvalidPath", `Invalid web name: ${JSON.stringify(name)}`);
    }
    return join(this.root, name);
  }

  async list(): Promise<WebStub[]> {
    try {
      const names = await listSubdirectories(this.root);
      return names.map((name) => ({ name }));
    } catch (err) {
      throw new WebError("IoError", `Failed to list webs in ${this.root}`, { cause: err });
    }
  }

  /**
   * @returns null when no directory of that name exists
   */
  async get(name: string): Promise<Web | null> {
    const directory = this.pathFor(name);
    try {
      return (await isDirectory(directory)) ? new Web(name, directory) : null;
    } catch (err) {
      throw fromFsError(WebError, err, `Failed to look up web ${name}`);
    }
  }

  async create(name: string): Promise<Web> {
    const directory = this.pathFor(name);
    try {
      await mkdir(directory);
    } catch (err) {
      throw fromFsError(WebError, err, `Failed to create web ${name}`);
    }
    log.info("Web created", { web: name });
    return new Web(name, directory);
  }
}
