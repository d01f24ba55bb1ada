export { awardTitle, vacateTitle } from './championships.js';
