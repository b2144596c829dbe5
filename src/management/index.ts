export { BlobLister, parseListBlobsXml, decodeXmlText } from './list.js';
export { PropertiesManager, parseProperties } from './properties.js';
