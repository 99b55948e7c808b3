export * from "./course/CourseTypes.js";
export * from "./index/IndexTypes.js";
export * from "./paths/PathHelper.js";
export * from "./guards/TypeGuards.js";
