import { PropertyExpressionError } from '../src/errors'
import { getChainValue, getChainValues, propertyChain, setChainValue } from '../src/expression'

type Order = {
    id: number
    customer: { name: string; address: { city: string } | null }
    lines: string[]
}

const order = (): Order => ({
    id: 7,
    customer: { name: 'Ada', address: { city: 'Oslo' } },
    lines: ['tea'],
})

describe('propertyChain', () => {
    it('should read the members an expression walks through', () => {
        expect(propertyChain((o: Order) => o.id)).toEqual(['id'])
        expect(propertyChain((o: Order) => o.customer.address?.city)).toEqual(['customer', 'address', 'city'])
    })

    it('should return the same frozen chain for the same expression', () => {
        const expression = (o: Order) => o.customer.name
        const chain = propertyChain(expression)

        expect(propertyChain(expression)).toBe(chain)
        expect(Object.isFrozen(chain)).toBe(true)
    })

    it('should reject method calls', () => {
        expect(() => propertyChain((o: Order) => o.lines.join(','))).toThrow(PropertyExpressionError)
    })

    it('should reject expressions that do not return a chain', () => {
        expect(() => propertyChain((o: Order) => o.id + 1)).toThrow(PropertyExpressionError)
        expect(() => propertyChain(() => 'constant')).toThrow(PropertyExpressionError)
    })

    it('should reject the identity expression', () => {
        expect(() => propertyChain((o: Order) => o)).toThrow('must access at least one property')
    })

    it('should reject symbol members', () => {
        const key = Symbol('key')
        const expression = (o: Record<symbol, number>) => o[key]

        expect(() => propertyChain(expression)).toThrow(PropertyExpressionError)
    })
})

describe('chain values', () => {
    it('should follow a chain to its value', () => {
        expect(getChainValue(order(), ['customer', 'address', 'city'])).toEqual({ found: true, value: 'Oslo' })
    })

    it('should stop at a missing link', () => {
        const source = order()
        source.customer.address = null

        expect(getChainValue(source, ['customer', 'address', 'city'])).toEqual({ found: false })
        expect(getChainValues(source, ['customer', 'address', 'city']).map((link) => link.name)).toEqual([
            'customer',
            'address',
        ])
    })

    it('should report undefined leaves as found', () => {
        expect(getChainValue(order(), ['customer', 'nickname'])).toEqual({ found: true, value: undefined })
    })

    it('should assign the last member', () => {
        const source = order()

        expect(setChainValue(source, ['customer', 'address', 'city'], 'Lima')).toBe(true)
        expect(source.customer.address?.city).toBe('Lima')
    })

    it('should refuse to assign through a missing link', () => {
        const source = order()
        source.customer.address = null

        expect(setChainValue(source, ['customer', 'address', 'city'], 'Lima')).toBe(false)
    })
})
