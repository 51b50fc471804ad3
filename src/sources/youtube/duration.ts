const ISO_DURATION =
	/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/** `PT1H5M3S` → `1:05:03`, `PT45S` → `0:45`; anything unparseable → `Unknown`. */
export function formatDuration(iso: string | null | undefined): string {
	if (!iso) return "Unknown";

	const match = ISO_DURATION.exec(iso);
	if (!match || iso === "P" || iso.endsWith("T")) return "Unknown";

	const days = Number(match[1] ?? 0);
	const hours = Number(match[2] ?? 0) + days * 24;
	const minutes = Number(match[3] ?? 0);
	const seconds = Math.floor(Number(match[4] ?? 0));

	const ss = String(seconds).padStart(2, "0");
	if (hours > 0) {
		return `${hours}:${String(minutes).padStart(2, "0")}:${ss}`;
	}
	return `${minutes}:${ss}`;
}
