/**
 * A web: one directory of pages under the store root
 */

import { join } from "node:path";
import type { PageDetail, PageStub } from "../types";
import { isSafePathSegment } from "../utils/path-safety";
import { PageError, WebError, fromFsError } from "./errors";
import { listSubdirectories } from "./fs-utils";
import { Page } from "./page";

function pageName(name: string): string {
  if (!isSafePathSegment(name)) {
    throw new PageError("InvalidPath", `Invalid page name: ${JSON.stringify(name)}`);
  }
  return name;
}

export class Web {
  constructor(
    readonly name: string,
    readonly directory: string
  ) {}

  async listPages(): Promise<PageStub[]> {
    try {
      const names = await listSubdirectories(this.directory);
      return names.map((name) => ({ name }));
    } catch (err) {
      throw fromFsError(WebError, err, `Failed to list pages of ${this.name}`);
    }
  }

  async openPage(name: string): Promise<Page> {
    return Page.open(join(this.directory, pageName(name)));
  }

  /**
   * Bind a detail to its page directory in this web. Nothing is written
   * until `create()` or `update()` is called on the result.
   */
  newPage(detail: PageDetail): Page {
    return Page.bind(join(this.directory, pageName(detail.name)), detail);
  }
}
