/**
 * @module model-families
 * Catalogue of the segmentation model families the adapters can drive.
 */

import type { ModelDescriptor } from '@sam-adapter/types';

/** Axis order every shipped family expects for its input image. */
export const DEFAULT_INPUT_IMAGE_AXES = 'yxc';

function defineFamily(id: string, fullName: string, description: string): ModelDescriptor {
  return Object.freeze({ id, fullName, description, inputImageAxes: DEFAULT_INPUT_IMAGE_AXES });
}

export const EFFICIENT_SAM = defineFamily(
  'efficient-sam',
  'EfficientSAM',
  'Lightweight SAM distilled with masked image pretraining; good accuracy on CPU.',
);

export const SAM2_TINY = defineFamily(
  'sam2-tiny',
  'SAM2 Tiny',
  'Smallest SAM2 Hiera checkpoint; fastest encoding, coarser boundaries.',
);

export const SAM2_SMALL = defineFamily(
  'sam2-small',
  'SAM2 Small',
  'SAM2 Hiera small checkpoint; balanced speed and quality.',
);

export const SAM2_LARGE = defineFamily(
  'sam2-large',
  'SAM2 Large',
  'SAM2 Hiera large checkpoint; best quality, needs a GPU for interactive use.',
);

export const EFFICIENT_VIT_SAM = defineFamily(
  'efficientvit-sam-l0',
  'EfficientViTSAM-l0',
  'EfficientViT-SAM l0 variant; fast high-resolution encoder.',
);

/** Every family, in the order model pickers list them. */
export const MODEL_FAMILIES: readonly ModelDescriptor[] = Object.freeze([
  SAM2_TINY,
  SAM2_SMALL,
  SAM2_LARGE,
  EFFICIENT_SAM,
  EFFICIENT_VIT_SAM,
]);
