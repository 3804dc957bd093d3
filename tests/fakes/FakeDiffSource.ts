import {DiffSource} from '../../src/engine/DiffReviewEngine.js';
import {DiffLoadResult} from '../../src/models.js';

type Pending = {repoRoot: string; resolve: (result: DiffLoadResult) => void};

/**
 * In-memory diff source. Answers immediately with the seeded result, or holds
 * requests until the test releases them when `manual` is set.
 */
export class FakeDiffSource implements DiffSource {
  private result: DiffLoadResult = {ok: true, text: ''};
  readonly pending: Pending[] = [];
  calls = 0;

  constructor(private manual = false) {}

  setDiff(text: string): this {
    this.result = {ok: true, text};
    return this;
  }

  setFailure(message: string): this {
    this.result = {ok: false, message};
    return this;
  }

  loadDiffText(repoRoot: string): Promise<DiffLoadResult> {
    this.calls++;
    if (!this.manual) return Promise.resolve(this.result);
    return new Promise(resolve => this.pending.push({repoRoot, resolve}));
  }

  release(index: number, result: DiffLoadResult): void {
    const request = this.pending[index];
    if (!request) throw new Error(`No pending load #${index}`);
    request.resolve(result);
  }
}
