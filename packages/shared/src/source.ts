// ============================================================================
// LaunchTrack Data Source Types
// ============================================================================

export type SourceKind = 'simulator' | 'serial' | 'tcp';

export const BAUD_RATES = [9600, 115200, 57600, 38400] as const;
export type BaudRate = (typeof BAUD_RATES)[number];

export type SourceConfig =
  | { type: 'simulator' }
  | { type: 'serial'; path: string; baudRate: BaudRate }
  | { type: 'tcp'; host: string; port: number };

export interface ConnectResult {
  ok: boolean;
  message: string;
}

export interface SourceAvailability {
  type: SourceKind;
  label: string;
  available: boolean;
  reason?: string;
}

export interface SerialPortEntry {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
}
