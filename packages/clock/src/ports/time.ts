/** Duration or epoch offset in milliseconds. */
export type Milliseconds = number
