export { assessSpeed, gradeLoadTime, loadTimeSeverity } from './speed.js';
export { assessContent, gradeContent } from './content.js';
