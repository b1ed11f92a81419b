import * as TB from '@sinclair/typebox';

export { TB };
