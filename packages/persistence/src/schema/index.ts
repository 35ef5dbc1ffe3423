/**
 * Audit table definitions.
 */

export { recordIdColumn, orgIdColumn, timestampColumn } from './common.js';
export { operateLogs, type OperateLogRow, type NewOperateLogRow } from './operate-logs.js';
export {
	passwordChangeLogs,
	type PasswordChangeLogRow,
	type NewPasswordChangeLogRow,
} from './password-change-logs.js';
export { userLoginLogs, type UserLoginLogRow, type NewUserLoginLogRow } from './user-login-logs.js';
export { ftpLogs, type FtpLogRow, type NewFtpLogRow } from './ftp-logs.js';
