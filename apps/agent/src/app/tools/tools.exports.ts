// One export per tool. ALL_TOOLS in index.ts is derived from this file.
export { lookupUserByEmailTool } from './lookup-user-by-email.tool';
export { lookupItemByIdTool } from './lookup-item-by-id.tool';
export { lookupUserItemsTool } from './lookup-user-items.tool';
export { httpGetTool } from './http-get.tool';
export { httpPostTool } from './http-post.tool';
