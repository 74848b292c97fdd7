/*
Copyright 2025 Adobe. All rights reserved.
This file is licensed to you under the Apache License, Version 2.0 (the "License");
you may not use this file except in compliance with the License. You may obtain a copy
of the License at http://www.apache.org/licenses/LICENSE-2.0

Unless required by applicable law or agreed to in writing, software distributed under
the License is distributed on an "AS IS" BASIS, WITHOUT WARRANTIES OR REPRESENTATIONS
OF ANY KIND, either express or implied. See the License for the specific language
governing permissions and limitations under the License.
*/
import type { Highlight } from "../../core/message/message-view.js";
import type { Notifier } from "../../core/repair/notify.js";

export type HistoryEntry = {
  id: number;
  url: string;
  status: string;
  highlight?: Highlight;
  comment?: string;
};

/**
 * The proxy's in-memory history; repaired responses get annotated here.
 * Only the newest `limit` entries are kept.
 */
export class ProxyHistory {
  private readonly items: HistoryEntry[] = [];
  private nextId = 1;

  constructor(private readonly limit: number) {}

  record(url: string, statusLine: string): HistoryEntry {
    const entry: HistoryEntry = { id: this.nextId++, url, status: statusLine };

    this.items.push(entry);
    if (this.items.length > this.limit) {
      this.items.splice(0, this.items.length - this.limit);
    }

    return entry;
  }

  notifierFor(entry: HistoryEntry): Notifier {
    return {
      annotate({ highlight, comment }) {
        entry.highlight = highlight;
        entry.comment = comment;
        console.info(`# [${highlight}] #${entry.id} ${comment}`);
      },
      alert(message) {
        console.warn(message);
      },
    };
  }

  get entries(): readonly HistoryEntry[] {
    return this.items;
  }
}
