/**
 * Debug logger — only outputs when PHISHLENS_DEBUG is set.
 * Use for per-request operational logs that would flood production stdout.
 */
const enabled = () => !!process.env.PHISHLENS_DEBUG;

export function debug(tag: string, message: string): void {
  if (enabled()) console.log(`[${tag}] ${message}`);
}
