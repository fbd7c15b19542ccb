/**
 * Represents the lifecycle state of a stage processor
 */
export enum StageState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Polling = 'polling',
  Processing = 'processing',
  Stopped = 'stopped'
}
