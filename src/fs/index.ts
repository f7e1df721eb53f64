export type { IFileSystem } from './interface.js';
export { RealFs } from './real-fs.js';
export { VirtualFs } from './virtual-fs.js';
