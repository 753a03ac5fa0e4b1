// Service layer exports

export {
  CaptureSession,
  type BrowserLauncher,
  type CaptureBrowser,
  type CaptureContext,
  type CapturePage,
  type CapturedRequest,
  type CaptureSessionDeps,
  type InterruptSource,
} from './capture-session.js'
export { StopSignal } from './stop-signal.js'
export {
  killStaleBrowsers,
  parseProcessList,
  execFileRunner,
  type CommandRunner,
  type ProcessKiller,
  type ReaperOptions,
} from './process-reaper.js'
export { scanHar, matchHarEntry } from './har-scanner.js'
