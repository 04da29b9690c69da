import { CancelledError, TransientError } from "./errors.js";
import type { BrowsingContext, PageHandle } from "./browser.js";
import type { PageReader, PageView } from "./readers.js";

export type MaterializeOutcome<V> =
  | { kind: "materialized"; view: V; cycles: number; truncated: boolean }
  | { kind: "empty"; view: V; cycles: number };

export interface MaterializerOptions {
  maxLoadCycles: number;
  settleTimeoutMs: number;
  pageTimeoutMs: number;
}

export type CycleState =
  | { phase: "loading"; cycle: number; count: number }
  | { phase: "stable"; cycle: number; count: number }
  | { phase: "exhausted"; cycle: number; count: number };

/**
 * One step of the load loop: given the state before a cycle and the count
 * observed after it, decide whether to keep triggering lazy loading.
 */
export function nextCycleState(
  state: CycleState,
  observed: number,
  { maxLoadCycles, minItems = 0 }: { maxLoadCycles: number; minItems?: number }
): CycleState {
  const cycle = state.cycle + 1;
  const grown = observed > state.count;
  if (!grown && observed >= minItems) return { phase: "stable", cycle, count: observed };
  if (cycle >= maxLoadCycles) return { phase: "exhausted", cycle, count: Math.max(observed, state.count) };
  return { phase: "loading", cycle, count: Math.max(observed, state.count) };
}

export interface MaterializeControl {
  minItems?: number;
  /** Run-wide cancellation. */
  signal?: AbortSignal;
  /** Aborted when the retry attempt this read belongs to has timed out. */
  attemptSignal?: AbortSignal;
}

function checkStopped({ signal, attemptSignal }: MaterializeControl) {
  if (signal?.aborted) throw new CancelledError();
  if (attemptSignal?.aborted) throw new TransientError("attempt timed out; page read abandoned");
}

export class ContentMaterializer {
  constructor(
    private readonly context: BrowsingContext,
    private readonly options: MaterializerOptions
  ) {}

  async materialize<V extends PageView<unknown>>(
    url: string,
    reader: PageReader<V>,
    control: MaterializeControl = {}
  ): Promise<MaterializeOutcome<V>> {
    checkStopped(control);
    const page = await this.context.open(url, { timeoutMs: this.options.pageTimeoutMs });
    try {
      if (reader.expandSelector) await page.expand(reader.expandSelector);

      const final = await this.loadAll(page, reader.itemSelector, control);
      if (final.phase === "exhausted") {
        console.warn(
          `⚠️  ${url}: still loading after ${final.cycle} cycles (${final.count} ${reader.kind} items); using what is there`
        );
      }

      const view = reader.read(await page.content(), page.url);
      if (view.items.length === 0) {
        return { kind: "empty", view, cycles: final.cycle };
      }
      return { kind: "materialized", view, cycles: final.cycle, truncated: final.phase === "exhausted" };
    } finally {
      await page.close();
    }
  }

  private async loadAll(
    page: PageHandle,
    selector: string,
    control: MaterializeControl
  ): Promise<CycleState> {
    const limits = { maxLoadCycles: this.options.maxLoadCycles, minItems: control.minItems };
    let state: CycleState = { phase: "loading", cycle: 0, count: await page.countItems(selector) };

    while (state.phase === "loading") {
      checkStopped(control);
      await page.loadMore();
      await page.settle(this.options.settleTimeoutMs);
      state = nextCycleState(state, await page.countItems(selector), limits);
    }
    return state;
  }
}
