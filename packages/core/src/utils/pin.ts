import { timingSafeEqual } from "node:crypto";

const MIN_PIN_LENGTH = 4;

/** A PIN is at least four ASCII digits. */
export function isStrongPin(pin: string): boolean {
	return pin.length >= MIN_PIN_LENGTH && /^[0-9]+$/.test(pin);
}

/** Constant-time equality for plain-text PINs. */
export function pinsMatch(expected: string, provided: string): boolean {
	const a = Buffer.from(expected, "utf-8");
	const b = Buffer.from(provided, "utf-8");
	if (a.length !== b.length) return false;
	return timingSafeEqual(a, b);
}
