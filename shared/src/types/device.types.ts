export interface GeoPoint {
  latitude: number;
  longitude: number;
}

// Written by the device registration collaborator; the player only reads `active`.
export interface DeviceInfo {
  deviceId: string;
  deviceName: string;
  location: string;
  active: boolean;
  geo?: GeoPoint;
}

export interface DeviceHealthMetrics {
  cpuUsage: number;
  memoryUsage: number;
  diskUsage: number;
  uptime: number;
  mediaFreeBytes: number | null;
  timestamp: Date;
}
