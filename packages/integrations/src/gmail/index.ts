export { GmailClient } from './client.js'
export { parseAddress, parseAddressList, splitAddressList } from './address.js'
export { extractTextBody, extractAttachments } from './body-parser.js'
export { toEmailRecord, messageDate } from './message.js'
