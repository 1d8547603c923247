import { QuotaExceededError } from '../errors.js';
import type { StoreUsage } from './i-artifact-store.js';

/** Space accounting shared by the store implementations */
export class QuotaLedger {
	private used = 0;
	private count = 0;

	constructor(readonly allocated: number) {
		if (!Number.isFinite(allocated) || allocated < 0) {
			throw new Error(`allocated space must be a non-negative number of bytes, got ${allocated}`);
		}
	}

	available(): number {
		return Math.max(0, this.allocated - this.used);
	}

	/** Throws if `bytes` more would not fit */
	ensure(bytes: number): void {
		const available = this.available();
		if (bytes > available) {
			throw new QuotaExceededError(bytes, available);
		}
	}

	/** Check and account in one step; callers must not await between the two */
	commit(bytes: number): void {
		this.ensure(bytes);
		this.used += bytes;
		++this.count;
	}

	/** Account for content already on disk, without a budget check */
	record(bytes: number): void {
		this.used += bytes;
		++this.count;
	}

	release(bytes: number): void {
		this.used = Math.max(0, this.used - bytes);
		this.count = Math.max(0, this.count - 1);
	}

	usage(): StoreUsage {
		return { allocated: this.allocated, used: this.used, count: this.count };
	}
}
