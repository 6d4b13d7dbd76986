/**
 * Wi-Fi peer state
 *
 * Pure snapshot of what the peer knows about the access point, the station link and internet reachability, plus
 * the helpers the daemon folds its observations with.
 */

import * as Option from 'effect/Option'

import { Backoff, type BackoffPolicy } from '@hearo/platform'
import type { Payload } from '@hearo/schemas/envelope'
import type { Wifi } from '@hearo/schemas/messages'

import type { StationReport } from '../ports/network-stack.port.ts'

export type WifiState = 'Init' | 'AccessPoint' | 'Connected' | 'Error'

export interface Station extends StationReport {
	/** Associated and addressed */
	readonly connected: boolean
}

export interface Internet {
	readonly reachable: boolean
	readonly lastCheckAtMs: number | null
	/** Consecutive failed probes */
	readonly failStreak: number
}

export interface WifiPeer {
	readonly state: WifiState
	readonly backoff: Backoff
	readonly nextStationCheckAtMs: number
	readonly nextInternetCheckAtMs: number
	readonly accessPoint: { readonly active: boolean; readonly ssid: string | null; readonly clients: number }
	readonly station: Station
	readonly internet: Internet
	readonly lastErrorCode: string | null
}

export const WifiPeer = {
	initial: (policy: BackoffPolicy, nowMs: number): WifiPeer => ({
		accessPoint: { active: false, clients: 0, ssid: null },
		backoff: Backoff.make(policy, nowMs),
		internet: { failStreak: 0, lastCheckAtMs: null, reachable: false },
		lastErrorCode: null,
		nextInternetCheckAtMs: nowMs,
		nextStationCheckAtMs: nowMs,
		state: 'Init',
		station: { connected: false, ip: null, rssi: null, ssid: null },
	}),

	station: (report: StationReport): Station => ({
		...report,
		connected: report.ssid !== null && report.ip !== null,
	}),

	recordProbe: (internet: Internet, reachable: boolean, nowMs: number): Internet => ({
		failStreak: reachable ? 0 : internet.failStreak + 1,
		lastCheckAtMs: nowMs,
		reachable,
	}),

	/**
	 * Why a connected peer should fall back to access point mode, if it should.
	 */
	lostReason: (peer: WifiPeer): Option.Option<Wifi.Events.LostReason.Type> => {
		if (peer.station.ssid === null) return Option.some('link_down')
		if (peer.station.ip === null) return Option.some('no_ip')
		if (!peer.internet.reachable) return Option.some('no_internet')
		return Option.none()
	},

	/**
	 * Result payload of `WSM_COMMAND_STATUS`.
	 */
	status: (peer: WifiPeer, nowMs: number, uptimeMs: number): Payload.Type => ({
		ap_mode: { active: peer.accessPoint.active, clients: peer.accessPoint.clients, ssid: peer.accessPoint.ssid },
		internet: {
			fail_streak: peer.internet.failStreak,
			last_check_ms_ago: peer.internet.lastCheckAtMs === null ? null : Math.max(0, nowMs - peer.internet.lastCheckAtMs),
			spotify_reachable: peer.internet.reachable,
		},
		last_error_code: peer.lastErrorCode,
		state: peer.state,
		station: {
			connected: peer.station.connected,
			ip: peer.station.ip,
			rssi: peer.station.rssi,
			ssid: peer.station.ssid,
		},
		uptime_ms: uptimeMs,
	}),
} as const
