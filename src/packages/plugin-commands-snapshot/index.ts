import * as diff from './diff.ts';
import * as save from './save.ts';

export { diff, save };
export type { SnapshotCommandOptions } from './common.ts';
