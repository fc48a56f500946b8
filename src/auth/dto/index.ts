export { SignupDto } from './signup.dto';
export { LoginDto } from './login.dto';
