export { withSession, getSession } from './withSession'
export type { WithSessionOptions } from './withSession'
