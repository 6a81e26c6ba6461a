export * from './brief/campaign-brief.dto';
export * from './brief/campaign-messaging.dto';
export * from './brief/product.dto';
