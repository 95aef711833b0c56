/**
 * Deterministic signed 32-bit key for `pg_advisory_xact_lock` (FNV-1a).
 */
export function hashLockKey(input: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < input.length; i++) {
		hash ^= input.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash | 0;
}
