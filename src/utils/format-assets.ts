import {
  AssetItemType,
  FormatAssetDto,
  FormatDto,
} from '../_shared/dto/responses/format.dto';

/**
 * Helpers over the `assets` of a creative format returned by
 * list_creative_formats. An asset without `item_type` is an individual
 * asset; an asset without `required` is optional.
 */

/**
 * Assets declared by the format, or an empty list for formats without any
 */
export function getFormatAssets(format: FormatDto): FormatAssetDto[] {
  return format.assets ? [...format.assets] : [];
}

export function getRequiredAssets(format: FormatDto): FormatAssetDto[] {
  return getFormatAssets(format).filter((asset) => isRequired(asset));
}

export function getOptionalAssets(format: FormatDto): FormatAssetDto[] {
  return getFormatAssets(format).filter((asset) => !isRequired(asset));
}

export function getIndividualAssets(format: FormatDto): FormatAssetDto[] {
  return getFormatAssets(format).filter(
    (asset) => itemType(asset) === 'individual',
  );
}

export function getRepeatableGroups(format: FormatDto): FormatAssetDto[] {
  return getFormatAssets(format).filter(
    (asset) => itemType(asset) === 'repeatable_group',
  );
}

export function getAssetCount(format: FormatDto): number {
  return getFormatAssets(format).length;
}

export function hasAssets(format: FormatDto): boolean {
  return getAssetCount(format) > 0;
}

function isRequired(asset: FormatAssetDto): boolean {
  return asset.required === true;
}

function itemType(asset: FormatAssetDto): AssetItemType {
  return asset.item_type ?? 'individual';
}
