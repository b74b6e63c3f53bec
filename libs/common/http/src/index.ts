export { HeaderBag, HeaderValue, readHeader, toHeaderBag } from './headers';
