// See: https://rollupjs.org/introduction/

import commonjs from '@rollup/plugin-commonjs'
import json from '@rollup/plugin-json'
import nodeResolve from '@rollup/plugin-node-resolve'
import typescript from '@rollup/plugin-typescript'
import { existsSync } from 'fs'

// Each action is bundled from <action>/src/index.ts to <action>/dist/index.js,
// which is what its action.yml runs.
const actions = ['render-chart', 'package-chart', 'apply-chart']

const configs = actions
  .filter((action) => existsSync(`${action}/src/index.ts`))
  .map((action) => ({
    input: `${action}/src/index.ts`,
    output: {
      esModule: true,
      file: `${action}/dist/index.js`,
      format: 'es' as const,
      sourcemap: true
    },
    plugins: [
      json(),
      typescript({
        tsconfig: './tsconfig.json',
        compilerOptions: {
          outDir: undefined,
          declaration: false
        }
      }),
      nodeResolve({ preferBuiltins: true }),
      commonjs()
    ]
  }))

export default configs
