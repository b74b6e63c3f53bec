export { CryptoModule } from './crypto.module';
export { PasswordService } from './password.service';
