// Any field whose name ends in "pin" (pin, currentPin, newPin, confirmPin)
// is masked before it reaches a log sink.

const PIN_KEY = /pin$/i;
const MASK = "****";

export function maskPins(data: Record<string, unknown> | undefined): Record<string, unknown> {
	const masked: Record<string, unknown> = {};
	if (!data) return masked;
	for (const [key, value] of Object.entries(data)) {
		masked[key] = PIN_KEY.test(key) ? MASK : value;
	}
	return masked;
}
