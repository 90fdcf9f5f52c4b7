/**
 * Branded types for names flowing through the state engine
 */

import { InvalidModuleNameError, InvalidTargetNameError, InvalidInputError } from '../errors/state'
import { CoreValidators } from '../validation/patterns'

/**
 * Brand utility type for creating type-safe branded types
 */
export type Brand<T, TBrand> = T & { readonly __brand: TBrand }

export type ModuleName = Brand<string, 'ModuleName'>
export type TargetName = Brand<string, 'TargetName'>
export type Hostname = Brand<string, 'Hostname'>

/**
 * Type creators validating and branding values in one step
 */
export class CoreBrandedTypeCreators {

    /**
     * Creates a branded module name. Accepts both 'x' and 'module.x'.
     * @throws InvalidModuleNameError if validation fails
     */
    static createModuleName(value: string): ModuleName {
        const name = value.startsWith('module.') ? value.slice('module.'.length) : value
        if (!CoreValidators.isValidModuleName(name)) {
            throw new InvalidModuleNameError(value)
        }
        return name as ModuleName
    }

    /**
     * @throws InvalidTargetNameError if validation fails
     */
    static createTargetName(value: string): TargetName {
        if (!CoreValidators.isValidTargetName(value)) {
            throw new InvalidTargetNameError(value)
        }
        return value as TargetName
    }

    /**
     * @throws InvalidInputError if validation fails
     */
    static createHostname(value: string): Hostname {
        if (!CoreValidators.isValidHostname(value)) {
            throw new InvalidInputError(`invalid hostname '${value}'`, { hostname: value })
        }
        return value as Hostname
    }
}
