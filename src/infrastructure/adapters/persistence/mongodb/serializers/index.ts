export { serializeDocument, PublicDocument } from './document.serializer';
