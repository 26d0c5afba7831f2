export { createProjectsRouter } from "./router.js";
export { PROJECT_COLLECTION, listProjects, createProject, getProject } from "./service.js";
