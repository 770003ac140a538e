/**
 * Formats whole seconds as H:MM:SS, e.g. 75.9 -> "0:01:15". Fractions are dropped.
 */
export const formatClock = (seconds: number): string => {
    const total = Math.max(0, Math.floor(seconds));
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    const secs = total % 60;
    return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
};
