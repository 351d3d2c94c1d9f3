export function round(n: number, digits = 2): number {
    const factor = 10 ** digits;
    return Math.round(n * factor) / factor;
}

export function avg(nums: number[]): number {
    const filtered = nums.filter(n => typeof n === 'number' && !isNaN(n));
    if (filtered.length === 0) return 0;
    return filtered.reduce((a, b) => a + b, 0) / filtered.length;
}

export function sum(nums: number[]): number {
    return nums.reduce((a, b) => a + (Number.isFinite(b) ? b : 0), 0);
}

export function median(nums: number[]): number {
    if (nums.length === 0) return 0;
    const sorted = [...nums].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation; 0 for fewer than two values. */
export function stdDev(nums: number[]): number {
    if (nums.length < 2) return 0;
    const mean = avg(nums);
    return Math.sqrt(nums.reduce((acc, n) => acc + (n - mean) ** 2, 0) / (nums.length - 1));
}
