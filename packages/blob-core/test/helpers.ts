import { fromString as u8FromString } from 'uint8arrays/from-string';

export const bytes = (text: string): Uint8Array => u8FromString(text, 'utf8');

/** Resolves with the rejection reason; fails if the promise fulfils */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (err) {
		return err;
	}
	throw new Error('Expected promise to reject');
}

export async function* chunked(...parts: string[]): AsyncGenerator<Uint8Array> {
	for (const part of parts) {
		await Promise.resolve();
		yield bytes(part);
	}
}
