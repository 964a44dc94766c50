export interface LogEntry {
  evt: string
  [field: string]: unknown
}

export type EventLogger = (entry: LogEntry) => void

// One JSON object per line, grep-able by `evt`
export const jsonLogger: EventLogger = entry => {
  console.log(JSON.stringify({ ...entry, timestamp: new Date().toISOString() }))
}

export const silentLogger: EventLogger = () => {}
