/**
 * BLE Adapter Interface
 * Narrow, platform-agnostic boundary to the radio binding. Optional features
 * are declared up front through LinkCapabilities rather than discovered at call time.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Observation (scanning)
// ─────────────────────────────────────────────────────────────────────────────

/** What the binding knows about a peripheral independent of one advertisement. */
export interface PeripheralDescriptor {
  address: string;
  name?: string;
  rssi?: number;
  serviceIds?: readonly string[];
  details?: unknown;
}

/** One received advertisement. */
export interface AdvertisementDescriptor {
  localName?: string;
  rssi?: number;
  serviceIds?: readonly string[];
  manufacturerData?: ReadonlyMap<number, Buffer>;
  serviceData?: ReadonlyMap<string, Buffer>;
  txPower?: number;
  connectable?: boolean;
  platformData?: unknown;
}

export type ScanningMode = 'active' | 'passive';

export interface ObservationHints {
  serviceIds: readonly string[];
  allowDuplicates: boolean;
  scanningMode?: ScanningMode;
  adapterId?: string;
  detectionOptions?: Readonly<Record<string, unknown>>;
}

export type ObservationCallback = (peripheral: PeripheralDescriptor, advertisement?: AdvertisementDescriptor) => void;

export interface ObservationSubscription {
  stop(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Link (one connection)
// ─────────────────────────────────────────────────────────────────────────────

export interface LinkCapabilities {
  readonly signalStrength: boolean;
  readonly transferUnit: boolean;
  readonly notifications: boolean;
}

export type NotificationHandler = (data: Buffer) => void;

export interface IBleLink {
  readonly capabilities: LinkCapabilities;

  /** Resolves false when the peripheral was reached but the link did not come up. */
  open(address: string, adapterId: string | undefined, timeoutMs: number): Promise<boolean>;
  close(): Promise<void>;
  isConnected(): boolean;

  readSignalStrength(): Promise<number | null>;
  readAttribute(id: string): Promise<Buffer>;
  writeAttribute(id: string, data: Buffer, ackRequired: boolean): Promise<void>;
  subscribeNotifications(id: string, handler: NotificationHandler): Promise<void>;
  unsubscribeNotifications(id: string): Promise<void>;

  /** Best effort; resolves the negotiated size when the binding reports one. */
  requestPreferredTransferUnit(size: number): Promise<number | null>;

  /** Register for link-drop notification; returns the unsubscribe function. */
  onDisconnect(listener: () => void): () => void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Adapter
// ─────────────────────────────────────────────────────────────────────────────

export interface IBleAdapter {
  readonly name: string;

  isAvailable(): Promise<boolean>;

  /** Rejects with AdapterUnavailableError when the radio cannot scan. */
  beginObservation(hints: ObservationHints, onObservation: ObservationCallback): Promise<ObservationSubscription>;

  createLink(): IBleLink;
}
