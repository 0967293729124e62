import {
  ResponseParsers,
  ResponseTypeRegistry,
  classResponseParser,
} from '../../core/registry';
import {
  CreateMediaBuyResponseDto,
  GetMediaBuyDeliveryResponseDto,
  GetProductsResponseDto,
  ListCreativeFormatsResponseDto,
  ListCreativesResponseDto,
  SyncCreativesResponseDto,
  UpdateMediaBuyResponseDto,
} from '../dto/responses';

/**
 * Response model of every task type the SDK understands out of the box
 */
export interface AdcpResponseTypes {
  get_products: GetProductsResponseDto;
  create_media_buy: CreateMediaBuyResponseDto;
  update_media_buy: UpdateMediaBuyResponseDto;
  list_creatives: ListCreativesResponseDto;
  list_creative_formats: ListCreativeFormatsResponseDto;
  get_media_buy_delivery: GetMediaBuyDeliveryResponseDto;
  sync_creatives: SyncCreativesResponseDto;
}

export type AdcpTaskType = keyof AdcpResponseTypes;

/**
 * Parsers backing the default registry. Spread into a new
 * ResponseTypeRegistry to add task types.
 */
export const DEFAULT_RESPONSE_PARSERS: Readonly<ResponseParsers<AdcpResponseTypes>> =
  Object.freeze({
    get_products: classResponseParser(GetProductsResponseDto),
    create_media_buy: classResponseParser(CreateMediaBuyResponseDto),
    update_media_buy: classResponseParser(UpdateMediaBuyResponseDto),
    list_creatives: classResponseParser(ListCreativesResponseDto),
    list_creative_formats: classResponseParser(ListCreativeFormatsResponseDto),
    get_media_buy_delivery: classResponseParser(GetMediaBuyDeliveryResponseDto),
    sync_creatives: classResponseParser(SyncCreativesResponseDto),
  });

let defaultRegistry: ResponseTypeRegistry<AdcpResponseTypes> | undefined;

/**
 * Process-wide registry, built on first use.
 * Building twice yields equal registries, so a racing first call is harmless.
 */
export function getDefaultResponseRegistry(): ResponseTypeRegistry<AdcpResponseTypes> {
  if (!defaultRegistry) {
    defaultRegistry = new ResponseTypeRegistry(DEFAULT_RESPONSE_PARSERS);
  }
  return defaultRegistry;
}
