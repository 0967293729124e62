export * from './adcp-response.dto';
export * from './format.dto';
export * from './get-products.dto';
export * from './media-buy.dto';
export * from './creatives.dto';
export * from './delivery.dto';
