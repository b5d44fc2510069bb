export {
    truthTableHandler,
    checkFormulaHandler,
    canonicalFormsHandler,
    karnaughMapHandler,
    exportTableHandler,
} from './core.js';
export { parseArgs } from './utils.js';
