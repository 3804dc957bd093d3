export {parseDiff, parseHunkHeader} from './diff/parser.js';
export {synthesizeUntrackedDiff} from './diff/untracked.js';
export {buildDisplayRows, findRowIndex, rowAnchor} from './diff/displayRows.js';
export {CommentStore, commentKeyForRow} from './services/CommentStore.js';
export {CommentPersistence, serializeComments, deserializeComments} from './services/CommentPersistence.js';
export {GitService} from './services/GitService.js';
export {AgentService, formatCommentsForAgent} from './services/AgentService.js';
export {DiffReviewEngine} from './engine/DiffReviewEngine.js';
export type {DiffSource, DiffReviewEngineOptions, DiffReviewServices} from './engine/DiffReviewEngine.js';
export {RowLayout} from './shared/utils/rowLayout.js';
export {LineWrapper} from './shared/utils/lineWrapper.js';
export {parseConfig} from './config.js';
export * from './models.js';
