/**
 * Conversion Module
 */

export { NumberConversion, PathConversion, TrackConversion } from './TypeConversion';
