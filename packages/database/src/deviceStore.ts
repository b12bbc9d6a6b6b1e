/**
 * Device Store — device_id → username mapping.
 *
 * Registration is an upsert: writing the same mapping twice leaves a single row
 * with the same username. Only `updated_at` moves.
 */

import type { SqliteDatabase } from './index';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface DeviceRecord {
    device_id: string;
    username: string;
    created_at: string;
    updated_at: string | null;
}

export interface UpsertDeviceResult {
    device_id: string;
    created: boolean;
}

export interface DeviceStore {
    upsertDevice(deviceId: string, username: string): UpsertDeviceResult;
    getDevice(deviceId: string): DeviceRecord | null;
    getDeviceUsername(deviceId: string): string | null;
}

// ─── Methods ─────────────────────────────────────────────────────────────────

export function createDeviceStore(db: SqliteDatabase): DeviceStore {
    const selectDevice = db.prepare<[string], DeviceRecord>(
        'SELECT device_id, username, created_at, updated_at FROM devices WHERE device_id = ?'
    );
    const insertDevice = db.prepare<[string, string]>(
        'INSERT INTO devices (device_id, username) VALUES (?, ?)'
    );
    const updateDevice = db.prepare<[string, string]>(
        "UPDATE devices SET username = ?, updated_at = datetime('now') WHERE device_id = ?"
    );

    const upsert = db.transaction((deviceId: string, username: string): UpsertDeviceResult => {
        const existing = selectDevice.get(deviceId);
        if (existing) {
            updateDevice.run(username, deviceId);
            return { device_id: deviceId, created: false };
        }
        insertDevice.run(deviceId, username);
        return { device_id: deviceId, created: true };
    });

    return {
        upsertDevice(deviceId, username) {
            return upsert(deviceId, username);
        },

        getDevice(deviceId) {
            return selectDevice.get(deviceId) ?? null;
        },

        getDeviceUsername(deviceId) {
            const device = selectDevice.get(deviceId);
            return device ? device.username : null;
        },
    };
}
