export { Title, MAX_TITLE_LEN } from './title.js';
export { DeadlineInput, DEADLINE_FORMAT, parseDeadline } from './deadline.js';
export { ResultLimit, QUERY_DEFAULT_LIMIT, QUERY_MAX_LIMIT } from './result-limit.js';
export { toUnsigned64 } from './count.js';
