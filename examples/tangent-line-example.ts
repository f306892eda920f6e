/**
 * Example: derivatives of a few expressions mixing Duals and plain numbers.
 */

import { Dual, div, sin, cos, pow } from '../src/index';

const x = Dual.variable(3, 'x');
console.log(x.mul(x).add(2).toString());      // value 11, derivative 6

const t = Dual.variable(0, 't');
console.log(sin(t).toString());               // value 0, derivative 1
console.log(cos(t).mul(t).toString());        // value 0, derivative 1

const u = Dual.variable(2, 'u');
console.log(pow(u, 3).toString());            // value 8, derivative 12
console.log(div(1, u).toString());            // value 0.5, derivative -0.25
console.log(pow(2, u).toString());            // value 4, derivative 4 ln 2
