import type { MeterDriver } from '../types'
import { c5isf } from './c5isf'
import { ultrimis } from './ultrimis'

/** All built-in drivers, in registration order. */
export const builtinDrivers: readonly MeterDriver[] = [c5isf, ultrimis]
