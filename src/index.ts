/**
 * scan-tasks – typed processing tasks for 3D scan pipelines.
 */
export * from './types';
export * from './errors';
export * from './config';
export { TaskPipeline, type PipelineResult } from './pipeline';
export {
  ProcessingTask,
  TaskCategory,
  TaskItem,
  TaskStatus,
  type ProgressEvent,
  type ProgressListener,
  type RunOptions,
  type WorkArgs,
} from './tasks/task';
export { settingsFromXml, settingsToXml, type SettingValue, type TaskSettings } from './tasks/settings';
export { SaveMesh, SaveObj, SavePly, SavePoints, SaveStl, SaveXyz } from './tasks/save';
export { LoadMesh, LoadPoints } from './tasks/load';
export { DownsampleLines } from './tasks/downsample';
export { TaskRegistry, createDefaultRegistry, type TaskFactory } from './tasks/registry';
export { TaskSettingsEditor, type SettingField } from './tasks/settings-editor';
export { ConsoleFileDialog, type FileDialog, type FileDialogOptions } from './dialogs/file-dialog';
export { FORMATS, getFormat } from './io/formats';
export { dialogFilter, type ScanDataFormat } from './io/format';
export { exportToSTL, StlFormat } from './io/stl';
export { encodePLY, PlyFormat } from './io/ply';
export { encodeXYZ, XyzFormat } from './io/xyz';
export { encodeOBJ, ObjFormat } from './io/obj';
export { decodeScan, encodeScan, readScan, ScanFormat } from './io/scan';
export { createLogger, configureLogging, type LogLevel } from './utils/logger';
