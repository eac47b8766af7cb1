// =============================================================================
// Generators shared by the property tests
// =============================================================================
//
// Check digits are computed here independently of the code under test, so a
// generated "valid" number is valid by construction.
//
import { FastCheck } from "effect"

const digit = FastCheck.integer({ min: 0, max: 9 })

export const digits = (minLength: number, maxLength: number): FastCheck.Arbitrary<string> =>
  FastCheck.array(digit, { minLength, maxLength }).map((values) => values.join(""))

// Luhn: the payload's last digit sits right next to the check digit, so it is
// doubled (and every second one going left).
export const withLuhnCheckDigit = (payload: string): string => {
  const sum = [...payload].reverse().reduce((acc, char, index) => {
    const value = index % 2 === 0 ? Number(char) * 2 : Number(char)
    return acc + (value > 9 ? value - 9 : value)
  }, 0)
  return `${payload}${(10 - (sum % 10)) % 10}`
}

const ABA_WEIGHTS = [3, 7, 1, 3, 7, 1, 3, 7]

export const withAbaCheckDigit = (payload: string): string => {
  const sum = [...payload].reduce((acc, char, index) => acc + Number(char) * ABA_WEIGHTS[index], 0)
  return `${payload}${(10 - (sum % 10)) % 10}`
}

// Same number with the last digit moved by one: the checksum can't hold
export const breakCheckDigit = (number: string): string =>
  `${number.slice(0, -1)}${(Number(number.slice(-1)) + 1) % 10}`

// 12 to 19 digits, Luhn-valid
export const cardNumber: FastCheck.Arbitrary<string> = digits(11, 18).map(withLuhnCheckDigit)

export const routingNumber: FastCheck.Arbitrary<string> = digits(8, 8).map(withAbaCheckDigit)

// The same characters as typed by a person: 0 to 2 spaces before each one and at the end
export const spaced = (value: string): FastCheck.Arbitrary<string> =>
  FastCheck.array(FastCheck.integer({ min: 0, max: 2 }), {
    minLength: value.length + 1,
    maxLength: value.length + 1
  }).map((gaps) =>
    [...value].map((char, index) => " ".repeat(gaps[index]) + char).join("") + " ".repeat(gaps[value.length])
  )

// A value paired with one way of typing it
export const typedAs = (value: FastCheck.Arbitrary<string>): FastCheck.Arbitrary<{ value: string; typed: string }> =>
  value.chain((clean) => spaced(clean).map((typed) => ({ value: clean, typed })))
