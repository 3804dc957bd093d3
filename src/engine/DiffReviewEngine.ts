import {EventEmitter} from 'node:events';
import {MESSAGE_NO_CHANGES} from '../constants.js';
import {DiffComment, DiffFile, DiffLoadResult, DisplayRow, SendResult} from '../models.js';
import {parseDiff} from '../diff/parser.js';
import {buildDisplayRows, finalWrapRowIndex, messageRows} from '../diff/displayRows.js';
import {CommentStore} from '../services/CommentStore.js';
import {CommentPersistence} from '../services/CommentPersistence.js';
import {GitService} from '../services/GitService.js';
import {AgentService, formatCommentsForAgent} from '../services/AgentService.js';
import {logDebug, logInfo} from '../shared/utils/logger.js';

export interface DiffSource {
  loadDiffText(repoRoot: string): Promise<DiffLoadResult>;
}

export interface DiffReviewEngineOptions {
  repoRoot: string;
  wrapWidth?: number;
  agentCommand?: string | null;
}

export interface DiffReviewServices {
  git?: DiffSource;
  agent?: AgentService;
  // null keeps comments in memory only
  persistence?: CommentPersistence | null;
}

/**
 * Owns one review: the parsed diff, its display rows and the comments anchored to them.
 *
 * Data flows one way on every change: parse → project rows → resolve comment positions.
 * Row rebuilds and position resolution happen in the same call, so readers never see
 * a comment index computed against older rows. Emits 'change' with the new version
 * number after every update.
 */
export class DiffReviewEngine extends EventEmitter {
  readonly repoRoot: string;
  private git: DiffSource;
  private agent: AgentService;
  private comments: CommentStore;
  private files: DiffFile[] = [];
  private rows: DisplayRow[] = [];
  private message: string | null = null;
  private wrapWidth: number;
  private generation = 0;
  private version = 0;
  private loading = false;

  constructor(opts: DiffReviewEngineOptions, services: DiffReviewServices = {}) {
    super();
    this.repoRoot = opts.repoRoot;
    this.wrapWidth = Math.max(0, opts.wrapWidth ?? 0);
    this.git = services.git ?? new GitService();
    this.agent = services.agent ?? new AgentService(opts.agentCommand ?? null);
    const persistence = services.persistence === undefined ? new CommentPersistence(opts.repoRoot) : services.persistence;
    this.comments = new CommentStore(persistence);
  }

  /**
   * Acquire and apply a fresh diff. Resolves false when a newer load superseded this one
   * and its result was dropped.
   */
  async load(): Promise<boolean> {
    const generation = ++this.generation;
    this.loading = true;
    this.bump();
    const result = await this.git.loadDiffText(this.repoRoot);
    if (generation !== this.generation) {
      logDebug(`[Engine] Dropping superseded load #${generation}`);
      return false;
    }
    this.loading = false;
    this.apply(result);
    return true;
  }

  loadText(text: string | Buffer): void {
    this.generation++;
    this.loading = false;
    this.apply({ok: true, text: Buffer.isBuffer(text) ? text.toString('utf8') : text});
  }

  private apply(result: DiffLoadResult): void {
    if (result.ok) {
      this.files = parseDiff(result.text);
      this.message = this.files.length === 0 ? MESSAGE_NO_CHANGES : null;
    } else {
      this.files = [];
      this.message = result.message;
    }
    this.comments.load();
    logInfo(`[Engine] Loaded ${this.files.length} files, ${this.comments.count} comments`);
    this.rebuild();
  }

  private rebuild(): void {
    this.rows = this.message !== null ? messageRows(this.message) : buildDisplayRows(this.files, this.wrapWidth);
    this.comments.resolvePositions(this.files, this.rows);
    this.bump();
  }

  private bump(): void {
    this.version++;
    this.emit('change', this.version);
  }

  setWrapWidth(width: number): void {
    const next = Math.max(0, Math.floor(width));
    if (next === this.wrapWidth) return;
    this.wrapWidth = next;
    this.rebuild();
  }

  toggleCollapsed(fileIndex: number): boolean {
    const file = this.files[fileIndex];
    if (!file) return false;
    file.collapsed = !file.collapsed;
    this.rebuild();
    return file.collapsed;
  }

  setAllCollapsed(collapsed: boolean): void {
    if (this.files.every(file => file.collapsed === collapsed)) return;
    for (const file of this.files) file.collapsed = collapsed;
    this.rebuild();
  }

  addComment(rowIndex: number, text: string): DiffComment | null {
    const comment = this.comments.addOrUpdate(this.files, this.rows, rowIndex, text);
    if (!comment) return null;
    this.comments.resolvePositions(this.files, this.rows);
    this.bump();
    return comment;
  }

  removeComment(index: number): boolean {
    const removed = this.comments.remove(index);
    if (removed) this.bump();
    return removed;
  }

  /**
   * Remove the comment anchored to the logical line shown at rowIndex.
   */
  removeCommentAtRow(rowIndex: number): boolean {
    const comment = this.commentForRow(rowIndex);
    if (!comment) return false;
    return this.removeComment(this.comments.indexOf(comment));
  }

  /**
   * Deliver every unsent comment to the agent and freeze them once it accepted them.
   */
  async sendComments(command?: string | null): Promise<SendResult> {
    const payload = formatCommentsForAgent(this.comments.unsent());
    if (!payload) return {success: false, error: 'No comments to send'};
    const result = command === undefined ? await this.agent.send(payload) : await this.agent.send(payload, command);
    if (result.success) {
      this.comments.markSent();
      this.comments.save();
      this.bump();
    }
    return result;
  }

  hide(): void {
    this.comments.save();
  }

  getFiles(): DiffFile[] {
    return this.files;
  }

  getRows(): DisplayRow[] {
    return this.rows;
  }

  getWrapWidth(): number {
    return this.wrapWidth;
  }

  getVersion(): number {
    return this.version;
  }

  isLoading(): boolean {
    return this.loading;
  }

  getComments(): DiffComment[] {
    return this.comments.unsent();
  }

  get commentCount(): number {
    return this.comments.count;
  }

  /** Comment drawn below rowIndex, if any */
  commentAtRow(rowIndex: number): DiffComment | undefined {
    return this.comments.commentAtRow(rowIndex);
  }

  /** Comment belonging to the logical line shown at rowIndex, wherever it wraps */
  commentForRow(rowIndex: number): DiffComment | undefined {
    return this.comments.commentAtRow(finalWrapRowIndex(this.rows, rowIndex));
  }
}
