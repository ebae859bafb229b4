import type { ProblemDetail, ProblemPage, SubmissionResult, TestResult } from "./types";

/** Settled outcome of a background request. Rejections never escape as exceptions. */
export type Result<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: Error };

/** Every payload a screen can receive, tagged by what was asked for. */
export type Completion =
	| { readonly kind: "auth"; readonly value: string | null }
	| { readonly kind: "problems"; readonly value: ProblemPage }
	| { readonly kind: "detail"; readonly value: ProblemDetail }
	| { readonly kind: "test"; readonly value: TestResult }
	| { readonly kind: "submit"; readonly value: SubmissionResult };

export type RequestKind = Completion["kind"];

// Process-wide, so a fresh screen never reuses an id an old screen still has in flight
let lastRequestId = 0;

export function nextRequestId(): number {
	lastRequestId += 1;
	return lastRequestId;
}

/**
 * The requests a screen is currently waiting for: at most one id per kind.
 * Starting a request of a kind supersedes the previous one, whose completion
 * then no longer matches and is dropped as stale.
 */
export class PendingRequests {
	#current = new Map<RequestKind, number>();

	begin(kind: RequestKind): number {
		const id = nextRequestId();
		this.#current.set(kind, id);
		return id;
	}

	owns(requestId: number): boolean {
		for (const id of this.#current.values()) {
			if (id === requestId) return true;
		}
		return false;
	}

	/** Consume a current id. Returns its kind, or undefined if the id is stale. */
	settle(requestId: number): RequestKind | undefined {
		for (const [kind, id] of this.#current) {
			if (id === requestId) {
				this.#current.delete(kind);
				return kind;
			}
		}
		return undefined;
	}

	isPending(kind: RequestKind): boolean {
		return this.#current.has(kind);
	}

	invalidate(kind: RequestKind): void {
		this.#current.delete(kind);
	}

	invalidateAll(): void {
		this.#current.clear();
	}

	get size(): number {
		return this.#current.size;
	}
}
