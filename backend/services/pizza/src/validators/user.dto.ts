// DTOs derived from the shared contract. No parallel schemas.
export { zUserCreate as signupDto, zLogin as loginDto } from "@shared/contracts/user.contract";
