import type { DEVICE_STATUS, IDENTITY_CHANGE_REASONS } from "../constants.js";

export type DeviceStatus = (typeof DEVICE_STATUS)[number];

export type IdentityChangeReason = (typeof IDENTITY_CHANGE_REASONS)[number];

export interface Device {
  id: string;
  name: string;
  status: DeviceStatus;
  createdAt: Date;
  lastSeenAt: Date;
  bundleVersion: number | null;
  prekeysRemaining: number | null;
}

export interface OfferedPrekey {
  id: number;
  publicKey: string;
}

export interface DeviceKeyBundle {
  deviceId: string;
  name: string;
  identityKey: string;
  signedPrekey: string;
  signedPrekeySig: string;
  bundleVersion: number;
  prekeysAvailable: number;
  prekey: OfferedPrekey | null;
}

export interface UploadKeyBundleResult {
  deviceId: string;
  bundleVersion: number;
  prekeysStored: number;
}

export interface ClaimPrekeyResult {
  claimed: true;
  prekeyId: number;
  publicKey: string;
  prekeysRemaining: number;
}
