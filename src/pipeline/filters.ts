import type { Dimensions, FilterChain, TargetCanvas } from './types';

// transpose=2: 90 degrees counter-clockwise, no vertical flip
export const ROTATE_FILTER = 'transpose=2';

export function isPortrait(dimensions: Dimensions): boolean {
    return dimensions.height > dimensions.width;
}

/**
 * Fit inside the canvas keeping aspect ratio, pad to the exact canvas with
 * the image centered, then force square pixels so every clip agrees on SAR.
 */
export function scalePadFilter(canvas: TargetCanvas): string {
    const { width: w, height: h } = canvas;
    return (
        `scale=${w}:${h}:force_original_aspect_ratio=decrease,` +
        `pad=${w}:${h}:(ow-iw)/2:(oh-ih)/2,` +
        `setsar=1`
    );
}

/**
 * Filters that take a clip of the given size onto the canvas.
 *
 * Every portrait clip is rotated the same way, whatever its rotation
 * metadata says; phone footage held upright is the case this serves.
 */
export function planFilters(dimensions: Dimensions, canvas: TargetCanvas): FilterChain {
    const filters: string[] = [];
    if (isPortrait(dimensions)) {
        filters.push(ROTATE_FILTER);
    }
    filters.push(scalePadFilter(canvas));
    return Object.freeze(filters);
}

export function toFilterExpression(chain: FilterChain): string {
    return chain.join(',');
}
